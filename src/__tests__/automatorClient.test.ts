import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  AutomatorClient,
  buildTriggerUrl,
  classifyRequestError,
  normalizeBaseUrl,
  selectAutomator,
} from '../services/automatorClient.js';
import { EventLog } from '../services/eventLog.js';
import type { AutomatorConfig } from '../types/index.js';
import { getFreePort, startFakeAutomator, type FakeAutomator } from './helpers.js';

function automator(overrides: Partial<AutomatorConfig> = {}): AutomatorConfig {
  return { id: 'auto_1', name: 'Studio', url: 'http://127.0.0.1:1', api_key: 'test-secret', enabled: true, ...overrides };
}

describe('automatorClient', () => {
  describe('URL helpers', () => {
    it('should add a scheme and strip trailing slashes', () => {
      expect(normalizeBaseUrl(' 192.168.1.50:3000/ ')).toBe('http://192.168.1.50:3000');
      expect(normalizeBaseUrl('https://automator.local//')).toBe('https://automator.local');
      expect(normalizeBaseUrl('   ')).toBe('');
    });

    it('should route each item type to its trigger path', () => {
      const base = 'http://10.0.0.2:7070';
      expect(buildTriggerUrl(base, 'macro', 'm5')).toBe('http://10.0.0.2:7070/api/macro/m5');
      expect(buildTriggerUrl(base, 'button', 'b1')).toBe('http://10.0.0.2:7070/api/trigger/button/b1');
      expect(buildTriggerUrl(base, 'shortcut', 's1')).toBe('http://10.0.0.2:7070/api/trigger/shortcut/s1');
      expect(buildTriggerUrl(base, 'unknown', 'x')).toBe('http://10.0.0.2:7070/api/macro/x');
    });

    it('should escape item ids', () => {
      expect(buildTriggerUrl('http://h', 'macro', 'a b/c')).toBe('http://h/api/macro/a%20b%2Fc');
    });
  });

  describe('selectAutomator', () => {
    const a = automator();
    const b = automator({ id: 'auto_2', name: 'Backup', enabled: false });

    it('should find an instance by id', () => {
      expect(selectAutomator([a, b], 'auto_2', true)).toEqual({ ok: true, automator: b });
    });

    it('should report an unknown id', () => {
      expect(selectAutomator([a], 'auto_9', true)).toEqual({
        ok: false,
        reason: 'not-found',
        message: 'Automator auto_9 not found',
      });
    });

    it('should pick the only candidate when no id is given', () => {
      expect(selectAutomator([a, b], undefined, true)).toEqual({ ok: true, automator: a });
    });

    it('should refuse to guess between several candidates', () => {
      const result = selectAutomator([a, b], undefined, false);
      expect(result.ok).toBe(false);
      expect(!result.ok && result.reason).toBe('ambiguous');
    });

    it('should report when nothing is configured', () => {
      const result = selectAutomator([], undefined, false);
      expect(!result.ok && result.reason).toBe('none');
    });
  });

  describe('classifyRequestError', () => {
    it('should recognise timeouts, refused connections and anything else', () => {
      expect(classifyRequestError(Object.assign(new Error('signal timed out'), { name: 'TimeoutError' }))).toBe('timeout');
      expect(classifyRequestError(new TypeError('fetch failed', { cause: { code: 'ECONNREFUSED' } }))).toBe(
        'unreachable',
      );
      expect(classifyRequestError(new AggregateError([{ code: 'EHOSTUNREACH' }]))).toBe('unreachable');
      expect(classifyRequestError(new Error('boom'))).toBe('other');
    });
  });

  describe('AutomatorClient', () => {
    let fake: FakeAutomator;
    let events: EventLog;
    let client: AutomatorClient;
    let automators: AutomatorConfig[];

    beforeEach(async () => {
      fake = await startFakeAutomator();
      events = new EventLog();
      automators = [automator({ url: fake.url })];
      client = new AutomatorClient(() => automators, events, { timeoutMs: 200, healthTimeoutMs: 200 });
    });

    afterEach(async () => {
      await client.close();
      await fake.close();
    });

    it('should call the macro endpoint and record success', async () => {
      const outcome = await client.trigger({ itemId: 'm5', itemName: 'Lights Up', itemType: 'macro' });

      expect(outcome).toEqual({
        ok: true,
        status: 200,
        url: `${fake.url}/api/macro/m5`,
        automatorId: 'auto_1',
        automatorName: 'Studio',
      });
      expect(fake.requests).toEqual([{ method: 'GET', url: '/api/macro/m5' }]);
      expect(events.recent().map((e) => e.detail)).toEqual([
        '[Studio] Calling macro: Lights Up',
        '[Studio] Triggered macro: Lights Up',
      ]);
    });

    it('should not send credentials', async () => {
      let authorization: string | undefined = 'unset';
      fake.respondWith((req, res) => {
        authorization = req.headers.authorization;
        res.end();
      });

      await client.trigger({ itemId: 'b1', itemType: 'button' });

      expect(authorization).toBeUndefined();
      expect(fake.requests[0].url).toBe('/api/trigger/button/b1');
    });

    it('should make no request for a disabled instance', async () => {
      automators = [automator({ url: fake.url, enabled: false })];

      const outcome = await client.trigger({ automatorId: 'auto_1', itemId: 'm5', itemType: 'macro' });

      expect(outcome).toMatchObject({ ok: false, kind: 'configuration', message: 'Studio is disabled' });
      expect(fake.requests).toEqual([]);
      expect(events.recent(1)[0].kind).toBe('config-error');
    });

    it('should make no request for an instance without a URL', async () => {
      automators = [automator({ url: '' })];

      const outcome = await client.trigger({ itemId: 'm5', itemType: 'macro' });

      expect(outcome).toMatchObject({ ok: false, kind: 'configuration', message: 'Studio URL not configured' });
    });

    it('should report an unknown instance as a configuration failure', async () => {
      const outcome = await client.trigger({ automatorId: 'auto_9', itemId: 'm5', itemType: 'macro' });

      expect(outcome).toEqual({ ok: false, kind: 'configuration', message: 'Automator auto_9 not found' });
    });

    it('should classify non-2xx answers as HTTP failures', async () => {
      fake.respondWith((_req, res) => {
        res.writeHead(500);
        res.end('broken');
      });

      const outcome = await client.trigger({ itemId: 'm5', itemType: 'macro' });

      expect(outcome).toMatchObject({ ok: false, kind: 'http-status', status: 500, message: 'HTTP 500' });
      expect(events.recent(1)[0]).toMatchObject({
        kind: 'http-error',
        detail: '[Studio] Failed to trigger macro m5: HTTP 500',
      });
    });

    it('should classify a silent instance as a timeout', async () => {
      fake.respondWith(() => {
        // never answers
      });

      const outcome = await client.trigger({ itemId: 'm5', itemType: 'macro' });

      expect(outcome).toMatchObject({ ok: false, kind: 'timeout', message: 'timed out after 200ms' });
      expect(events.recent(1)[0].kind).toBe('transport-error');
    });

    it('should classify a refused connection as a transport failure', async () => {
      automators = [automator({ url: `http://127.0.0.1:${await getFreePort()}` })];

      const outcome = await client.trigger({ itemId: 'm5', itemType: 'macro' });

      expect(outcome).toMatchObject({ ok: false, kind: 'transport' });
    });

    describe('checkConnection', () => {
      it('should probe the web connection endpoint', async () => {
        const status = await client.checkConnection('auto_1');

        expect(status).toMatchObject({ connected: true, error: null, automator_id: 'auto_1', automator_name: 'Studio' });
        expect(fake.requests).toEqual([{ method: 'GET', url: '/api/app/webconnection' }]);
      });

      it('should report HTTP errors', async () => {
        fake.respondWith((_req, res) => {
          res.writeHead(503);
          res.end();
        });

        expect((await client.checkConnection()).error).toBe('HTTP error: 503');
      });

      it('should report timeouts and refused connections', async () => {
        fake.respondWith(() => {
          // never answers
        });
        expect((await client.checkConnection()).error).toBe('Connection timeout - check if Automator is running');

        automators = [automator({ url: `http://127.0.0.1:${await getFreePort()}` })];
        expect((await client.checkConnection()).error).toBe('Cannot connect - check URL and port');
      });

      it('should report unknown, missing and unconfigured instances', async () => {
        expect((await client.checkConnection('auto_9')).error).toBe('Automator not found');

        automators = [];
        expect((await client.checkConnection()).error).toBe('No Automator specified');

        automators = [automator({ enabled: false })];
        expect((await client.checkConnection()).error).toBe('Not configured');
      });
    });

    describe('fetchItems', () => {
      it('should return the listed items', async () => {
        fake.respondWith((_req, res) => {
          res.writeHead(200, { 'Content-Type': 'application/json' });
          res.end(JSON.stringify([{ id: 'm1', title: 'One' }]));
        });

        const items = await client.fetchItems(automators[0], 'macros');

        expect(items).toEqual([{ id: 'm1', title: 'One' }]);
        expect(fake.requests[0].url).toBe('/api/macro/');
      });

      it('should reject non-array payloads and HTTP errors', async () => {
        fake.respondWith((_req, res) => {
          res.writeHead(200, { 'Content-Type': 'application/json' });
          res.end('{"items":[]}');
        });
        await expect(client.fetchItems(automators[0], 'buttons')).rejects.toThrow(
          'Unexpected buttons payload: expected an array',
        );

        fake.respondWith((_req, res) => {
          res.writeHead(404);
          res.end();
        });
        await expect(client.fetchItems(automators[0], 'shortcuts')).rejects.toThrow('HTTP 404 fetching shortcuts');
      });
    });

    it('should refuse requests after close', async () => {
      await client.close();
      const outcome = await client.trigger({ itemId: 'm5', itemType: 'macro' });
      expect(outcome).toMatchObject({ ok: false, kind: 'transport', message: 'Automator client is closed' });
    });
  });
});
