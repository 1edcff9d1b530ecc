import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  CatalogCache,
  mergeCatalogList,
  normalizeItem,
  shortcutTitle,
  type CatalogSource,
} from '../services/catalogCache.js';
import { EventLog } from '../services/eventLog.js';
import { ConfigurationError } from '../utils/errors.js';
import type { AutomatorConfig, CatalogListKey } from '../types/index.js';

const studio: AutomatorConfig = {
  id: 'auto_1',
  name: 'Studio',
  url: 'http://127.0.0.1:7070',
  api_key: '',
  enabled: true,
};

type FetchItems = CatalogSource['fetchItems'];

function listsSource(lists: Partial<Record<CatalogListKey, unknown[] | Error>>) {
  return vi.fn<FetchItems>(async (_automator, list) => {
    const value = lists[list];
    if (value instanceof Error) throw value;
    return value ?? [];
  });
}

describe('catalogCache', () => {
  describe('normalizeItem', () => {
    it('should stringify ids and pick the title from title, then name', () => {
      expect(normalizeItem({ id: 5, name: 'Lights Up' }, 'macros')).toEqual({
        id: '5',
        name: 'Lights Up',
        title: 'Lights Up',
        type: 'macro',
      });
      expect(normalizeItem({ id: 'b1' }, 'buttons')).toEqual({ id: 'b1', title: 'b1', type: 'button' });
    });

    it('should keep a known remote type over the list type', () => {
      expect(normalizeItem({ id: 'x', title: 'X', type: 'Button' }, 'macros')?.type).toBe('button');
      expect(normalizeItem({ id: 'y', title: 'Y', type: 'scene' }, 'macros')?.type).toBe('macro');
    });

    it('should drop entries without an id', () => {
      expect(normalizeItem({ title: 'nameless' }, 'macros')).toBeUndefined();
      expect(normalizeItem('m1', 'macros')).toBeUndefined();
    });

    it('should build shortcut titles from modifiers', () => {
      expect(shortcutTitle({ control: true, shift: true, key: 'F5' })).toBe('Ctrl + Shift + F5');
      expect(shortcutTitle({ alt: true })).toBe('Alt + Unknown');
      expect(normalizeItem({ id: 's1', key: 'A', title: 'ignored' }, 'shortcuts')).toEqual({
        id: 's1',
        key: 'A',
        title: 'A',
        type: 'shortcut',
      });
    });
  });

  describe('mergeCatalogList', () => {
    it('should replace items by id and drop ids missing upstream', () => {
      const existing = [
        { id: '1', title: 'A', type: 'macro' as const },
        { id: '2', title: 'B', type: 'macro' as const },
        { id: '3', title: 'C', type: 'macro' as const },
      ];
      const incoming = [
        { id: '1', title: 'A-renamed', type: 'macro' as const },
        { id: '2', title: 'B', type: 'macro' as const },
        { id: '4', title: 'D', type: 'macro' as const },
      ];

      const result = mergeCatalogList(existing, incoming);

      expect(result.items.map((i) => `${i.id}:${i.title}`)).toEqual(['1:A-renamed', '2:B', '4:D']);
      expect(result).toMatchObject({ added: 1, updated: 2, removed: 1 });
    });

    it('should keep one entry per id when the fetch repeats an id', () => {
      const result = mergeCatalogList([], [
        { id: '1', title: 'first', type: 'macro' },
        { id: '1', title: 'second', type: 'macro' },
      ]);
      expect(result.items).toEqual([{ id: '1', title: 'second', type: 'macro' }]);
    });
  });

  describe('CatalogCache', () => {
    let dir: string;
    let filePath: string;
    let events: EventLog;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'automator-bridge-catalog-'));
      filePath = join(dir, 'automator_cache.json');
      events = new EventLog();
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('should fetch every list and persist the result', async () => {
      const source = listsSource({
        macros: [{ id: 'm5', title: 'Lights Up' }],
        buttons: [{ id: 'b1', title: 'Go' }],
        shortcuts: [{ id: 's1', key: 'F1' }],
      });
      const cache = new CatalogCache(filePath, { fetchItems: source }, () => [studio], events);

      const catalog = await cache.refresh();

      expect(source).toHaveBeenCalledTimes(3);
      expect(catalog.macros.map((i) => i.id)).toEqual(['m5']);
      expect(catalog.buttons.map((i) => i.id)).toEqual(['b1']);
      expect(catalog.shortcuts[0].title).toBe('F1');
      expect(catalog.last_updated).not.toBeNull();
      expect(events.recent(1)[0].detail).toBe('[Studio] Refreshed 1 macros, 1 buttons, 1 shortcuts');

      const stored = JSON.parse(readFileSync(filePath, 'utf-8'));
      expect(stored.auto_1.macros[0].id).toBe('m5');
      expect(existsSync(`${filePath}.tmp`)).toBe(false);
    });

    it('should keep a list whose fetch failed', async () => {
      const cache = new CatalogCache(
        filePath,
        { fetchItems: listsSource({ macros: [{ id: 'm1', title: 'Old' }], buttons: [{ id: 'b1', title: 'Go' }] }) },
        () => [studio],
        events,
      );
      await cache.refresh();

      const failing = new CatalogCache(
        filePath,
        { fetchItems: listsSource({ macros: new Error('HTTP 500 fetching macros'), buttons: [] }) },
        () => [studio],
        events,
      );
      failing.load();
      const catalog = await failing.refresh();

      expect(catalog.macros.map((i) => i.title)).toEqual(['Old']);
      expect(catalog.buttons).toEqual([]);
      expect(events.recent(1)[0].detail).toBe('[Studio] Refreshed 1 macros, 0 buttons, 0 shortcuts (failed: macros)');
    });

    it('should return the cached catalog when every fetch fails', async () => {
      const cache = new CatalogCache(filePath, { fetchItems: listsSource({ macros: [{ id: 'm1' }] }) }, () => [studio], events);
      await cache.refresh();

      const down = new Error('connect ECONNREFUSED');
      const offline = new CatalogCache(
        filePath,
        { fetchItems: listsSource({ macros: down, buttons: down, shortcuts: down }) },
        () => [studio],
        events,
      );
      offline.load();

      const cached = await offline.refresh();
      expect(cached.macros.map((i) => i.id)).toEqual(['m1']);
      expect(events.recent(1)[0].detail).toBe('[Studio] Refresh failed, keeping cached catalog');

      const empty = await offline.refresh('auto_1', { useCacheOnFailure: false });
      expect(empty.macros).toEqual([]);
      expect(offline.findItem('auto_1', 'm1')?.id).toBe('m1');
    });

    it('should return the cached catalog without fetching when the instance has no URL', async () => {
      const source = listsSource({});
      const cache = new CatalogCache(filePath, { fetchItems: source }, () => [{ ...studio, url: '' }], events);

      const catalog = await cache.refresh();

      expect(source).not.toHaveBeenCalled();
      expect(catalog.last_updated).toBeNull();
    });

    it('should reject an unknown instance with a not-found error', async () => {
      const cache = new CatalogCache(filePath, { fetchItems: listsSource({}) }, () => [studio], events);

      const error = await cache.refresh('auto_missing').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error instanceof ConfigurationError && error.status).toBe(404);
    });

    it('should run refreshes of the same instance one at a time', async () => {
      let active = 0;
      let peak = 0;
      const fetchItems = vi.fn<FetchItems>(async () => {
        active++;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 5));
        active--;
        return [];
      });
      const cache = new CatalogCache(filePath, { fetchItems }, () => [studio], events);

      await Promise.all([cache.refresh(), cache.refresh()]);

      expect(fetchItems).toHaveBeenCalledTimes(6);
      expect(peak).toBe(3);
    });

    it('should find items across lists and forget removed instances', async () => {
      const cache = new CatalogCache(
        filePath,
        { fetchItems: listsSource({ buttons: [{ id: 'b1', title: 'Go' }] }) },
        () => [studio],
        events,
      );
      await cache.refresh();

      expect(cache.findItem('auto_1', 'b1')?.type).toBe('button');
      expect(cache.items('auto_1')).toHaveLength(1);

      expect(cache.remove('auto_1')).toBe(true);
      expect(cache.findItem('auto_1', 'b1')).toBeUndefined();
      expect(JSON.parse(readFileSync(filePath, 'utf-8'))).toEqual({});
    });

    it('should leave the cache unchanged when the file cannot be written', async () => {
      const lists: Partial<Record<CatalogListKey, unknown[]>> = { macros: [{ id: 'm1', title: 'Old' }] };
      const fetchItems = vi.fn<FetchItems>(async (_automator, list) => lists[list] ?? []);
      const cache = new CatalogCache(filePath, { fetchItems }, () => [studio], events);
      await cache.refresh();

      lists.macros = [{ id: 'm2', title: 'New' }];
      mkdirSync(`${filePath}.tmp`);

      await expect(cache.refresh()).rejects.toThrow();
      expect(cache.get('auto_1').macros.map((i) => i.title)).toEqual(['Old']);
      expect(JSON.parse(readFileSync(filePath, 'utf-8')).auto_1.macros[0].title).toBe('Old');
    });

    it('should hand out copies of cached lists', async () => {
      const cache = new CatalogCache(filePath, { fetchItems: listsSource({ macros: [{ id: 'm1' }] }) }, () => [studio], events);
      await cache.refresh();

      cache.get('auto_1').macros.length = 0;

      expect(cache.get('auto_1').macros).toHaveLength(1);
    });
  });
});
