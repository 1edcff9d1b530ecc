import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import type {
  AutomatorConfig,
  Catalog,
  CatalogItem,
  CatalogListKey,
  ItemType,
  KnownItemType,
} from '../types/index.js';
import type { EventLog } from './eventLog.js';
import type { AutomatorClient } from './automatorClient.js';
import { normalizeBaseUrl, selectAutomator } from './automatorClient.js';
import { parseItemType } from './configStore.js';
import { ConfigurationError } from '../utils/errors.js';
import { createLogger, errorMessage } from '../utils/logger.js';

export const CATALOG_LISTS: readonly CatalogListKey[] = ['macros', 'buttons', 'shortcuts'];

const LIST_ITEM_TYPE: Record<CatalogListKey, KnownItemType> = {
  macros: 'macro',
  buttons: 'button',
  shortcuts: 'shortcut',
};

const logger = createLogger('catalog');

export type CatalogSource = Pick<AutomatorClient, 'fetchItems'>;

export interface RefreshOptions {
  /** Return the previously cached catalog when every fetch fails (default true). */
  useCacheOnFailure?: boolean;
}

export interface MergeResult {
  items: CatalogItem[];
  added: number;
  updated: number;
  removed: number;
}

const storedCatalogSchema = z.object({
  macros: z.array(z.unknown()).default([]),
  buttons: z.array(z.unknown()).default([]),
  shortcuts: z.array(z.unknown()).default([]),
  last_updated: z.string().nullable().default(null),
});

const storedCacheSchema = z.record(storedCatalogSchema);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() ? value : undefined;
}

/**
 * The remote API reports shortcuts as bare key combinations; the display
 * title is rebuilt from the modifier flags in Ctrl, Alt, Shift order.
 */
export function shortcutTitle(raw: Record<string, unknown>): string {
  const parts: string[] = [];
  if (raw['control']) parts.push('Ctrl');
  if (raw['alt']) parts.push('Alt');
  if (raw['shift']) parts.push('Shift');
  const key = raw['key'];
  parts.push(typeof key === 'string' || typeof key === 'number' ? String(key) : 'Unknown');
  return parts.join(' + ');
}

export function normalizeItem(raw: unknown, list: CatalogListKey): CatalogItem | undefined {
  if (!isRecord(raw)) return undefined;
  const rawId = raw['id'];
  if (typeof rawId !== 'string' && typeof rawId !== 'number') return undefined;
  const id = String(rawId);
  if (!id) return undefined;

  if (list === 'shortcuts') {
    return { ...raw, id, type: 'shortcut', title: shortcutTitle(raw) };
  }

  const remoteType: ItemType = typeof raw['type'] === 'string' ? parseItemType(raw['type']) : 'unknown';
  return {
    ...raw,
    id,
    title: nonEmptyString(raw['title']) ?? nonEmptyString(raw['name']) ?? id,
    type: remoteType === 'unknown' ? LIST_ITEM_TYPE[list] : remoteType,
  };
}

/**
 * Replaces a cached list with a fresh fetch, keyed by id. Ids missing from the
 * fetch were deleted upstream; a repeated id within one fetch keeps its first
 * position and its last value.
 */
export function mergeCatalogList(existing: readonly CatalogItem[], incoming: readonly CatalogItem[]): MergeResult {
  const previous = new Map(existing.map((item) => [item.id, item]));
  const merged = new Map<string, CatalogItem>();
  for (const item of incoming) {
    merged.set(item.id, item);
  }

  let added = 0;
  let updated = 0;
  for (const id of merged.keys()) {
    if (previous.has(id)) updated++;
    else added++;
  }
  const removed = [...previous.keys()].filter((id) => !merged.has(id)).length;

  return { items: [...merged.values()], added, updated, removed };
}

function emptyCatalog(automatorId: string): Catalog {
  return { automator_id: automatorId, macros: [], buttons: [], shortcuts: [], last_updated: null };
}

function copyCatalog(catalog: Catalog): Catalog {
  return {
    ...catalog,
    macros: [...catalog.macros],
    buttons: [...catalog.buttons],
    shortcuts: [...catalog.shortcuts],
  };
}

/**
 * Persisted per-instance catalogs of macros, buttons and shortcuts. The cache
 * survives outages of the remote instance: a refresh whose fetches all fail
 * leaves it untouched.
 */
export class CatalogCache {
  private catalogs = new Map<string, Catalog>();
  private readonly locks = new Map<string, Promise<void>>();

  constructor(
    private readonly filePath: string,
    private readonly source: CatalogSource,
    private readonly getAutomators: () => readonly AutomatorConfig[],
    private readonly events: EventLog,
  ) {}

  load(): void {
    if (!existsSync(this.filePath)) return;
    try {
      const stored = storedCacheSchema.parse(JSON.parse(readFileSync(this.filePath, 'utf-8')));
      const catalogs = new Map<string, Catalog>();
      for (const [automatorId, entry] of Object.entries(stored)) {
        const catalog = emptyCatalog(automatorId);
        for (const list of CATALOG_LISTS) {
          catalog[list] = entry[list]
            .map((raw) => normalizeItem(raw, list))
            .filter((item): item is CatalogItem => item !== undefined);
        }
        catalog.last_updated = entry.last_updated;
        catalogs.set(automatorId, catalog);
      }
      this.catalogs = catalogs;
      logger.info(`Catalog cache loaded from ${this.filePath} (${catalogs.size} instances)`);
    } catch (error) {
      logger.error(`Error loading catalog cache from ${this.filePath}`, error);
    }
  }

  /** Writes `catalogs` to disk and only then makes it the live cache. */
  private commit(catalogs: Map<string, Catalog>): void {
    const dir = dirname(this.filePath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    const stored: Record<string, Omit<Catalog, 'automator_id'>> = {};
    for (const [automatorId, { macros, buttons, shortcuts, last_updated }] of catalogs) {
      stored[automatorId] = { macros, buttons, shortcuts, last_updated };
    }
    const tmp = `${this.filePath}.tmp`;
    writeFileSync(tmp, JSON.stringify(stored, null, 2), 'utf-8');
    renameSync(tmp, this.filePath);
    this.catalogs = catalogs;
  }

  private entry(automatorId: string): Catalog {
    let catalog = this.catalogs.get(automatorId);
    if (!catalog) {
      catalog = emptyCatalog(automatorId);
      this.catalogs.set(automatorId, catalog);
    }
    return catalog;
  }

  get(automatorId: string): Catalog {
    return copyCatalog(this.entry(automatorId));
  }

  items(automatorId: string): CatalogItem[] {
    const catalog = this.entry(automatorId);
    return [...catalog.macros, ...catalog.buttons, ...catalog.shortcuts];
  }

  findItem(automatorId: string, itemId: string): CatalogItem | undefined {
    const catalog = this.catalogs.get(automatorId);
    if (!catalog) return undefined;
    for (const list of CATALOG_LISTS) {
      const item = catalog[list].find((i) => i.id === itemId);
      if (item) return item;
    }
    return undefined;
  }

  remove(automatorId: string): boolean {
    if (!this.catalogs.has(automatorId)) return false;
    const next = new Map(this.catalogs);
    next.delete(automatorId);
    this.commit(next);
    return true;
  }

  /**
   * Applies fetched lists to the cached catalog. Only the lists present in
   * `fetched` are replaced. The cache changes only once the file is written.
   */
  merge(automatorId: string, fetched: Partial<Record<CatalogListKey, CatalogItem[]>>): Catalog {
    const catalog = copyCatalog(this.catalogs.get(automatorId) ?? emptyCatalog(automatorId));
    for (const list of CATALOG_LISTS) {
      const incoming = fetched[list];
      if (!incoming) continue;
      const result = mergeCatalogList(catalog[list], incoming);
      catalog[list] = result.items;
      logger.debug(
        `${automatorId} ${list}: ${result.added} added, ${result.updated} updated, ${result.removed} removed`,
      );
    }
    catalog.last_updated = new Date().toISOString();
    this.commit(new Map(this.catalogs).set(automatorId, catalog));
    return copyCatalog(catalog);
  }

  private async exclusive<T>(automatorId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(automatorId) ?? Promise.resolve();
    const run = previous.then(task);
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.locks.set(automatorId, tail);
    try {
      return await run;
    } finally {
      if (this.locks.get(automatorId) === tail) {
        this.locks.delete(automatorId);
      }
    }
  }

  async refresh(automatorId?: string, options: RefreshOptions = {}): Promise<Catalog> {
    const selection = selectAutomator(this.getAutomators(), automatorId, false);
    if (!selection.ok) {
      throw new ConfigurationError(selection.message, selection.reason === 'not-found' ? 404 : 400);
    }
    const automator = selection.automator;

    if (!normalizeBaseUrl(automator.url)) {
      logger.info(`No URL for ${automator.name}, using cached catalog`);
      return this.get(automator.id);
    }

    return this.exclusive(automator.id, async () => {
      const results = await Promise.all(
        CATALOG_LISTS.map(async (list) => {
          try {
            const raw = await this.source.fetchItems(automator, list);
            const items = raw
              .map((entry) => normalizeItem(entry, list))
              .filter((item): item is CatalogItem => item !== undefined);
            return { list, items };
          } catch (error) {
            logger.warn(`Failed to fetch ${list} from ${automator.name}: ${errorMessage(error)}`);
            return { list, error: errorMessage(error) };
          }
        }),
      );

      const fetched: Partial<Record<CatalogListKey, CatalogItem[]>> = {};
      const failed: string[] = [];
      for (const result of results) {
        if ('items' in result && result.items) {
          fetched[result.list] = result.items;
        } else {
          failed.push(result.list);
        }
      }

      if (failed.length === CATALOG_LISTS.length) {
        this.events.record('catalog', `[${automator.name}] Refresh failed, keeping cached catalog`);
        return options.useCacheOnFailure === false ? emptyCatalog(automator.id) : this.get(automator.id);
      }

      const catalog = this.merge(automator.id, fetched);
      const counts = CATALOG_LISTS.map((list) => `${catalog[list].length} ${list}`).join(', ');
      const partial = failed.length > 0 ? ` (failed: ${failed.join(', ')})` : '';
      this.events.record('catalog', `[${automator.name}] Refreshed ${counts}${partial}`);
      return catalog;
    });
  }
}
