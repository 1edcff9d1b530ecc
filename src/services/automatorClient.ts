import { Agent, fetch } from 'undici';
import type { AutomatorConfig, CatalogListKey, ConnectionStatus, ItemType } from '../types/index.js';
import type { EventLog } from './eventLog.js';
import { createLogger, errorMessage } from '../utils/logger.js';

export const DEFAULT_TIMEOUT_MS = 5000;
export const DEFAULT_CONNECTIONS_PER_ORIGIN = 20;
export const DEFAULT_MAX_IN_FLIGHT = 50;

const STATUS_PATH = '/api/app/webconnection';

const LIST_PATHS: Record<CatalogListKey, string> = {
  macros: '/api/macro/',
  buttons: '/api/trigger/button/',
  shortcuts: '/api/trigger/shortcut/',
};

const UNREACHABLE_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ENOTFOUND',
  'EAI_AGAIN',
  'UND_ERR_SOCKET',
]);

const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'UND_ERR_CONNECT_TIMEOUT', 'UND_ERR_HEADERS_TIMEOUT']);

const logger = createLogger('automator');

export interface AutomatorClientOptions {
  timeoutMs?: number;
  healthTimeoutMs?: number;
  connectionsPerOrigin?: number;
  maxInFlight?: number;
}

export interface DispatchRequest {
  automatorId?: string;
  itemId: string;
  itemName?: string;
  itemType: ItemType;
}

export type DispatchFailureKind = 'configuration' | 'timeout' | 'transport' | 'http-status';

export type DispatchOutcome =
  | {
      ok: true;
      automatorId: string;
      automatorName: string;
      url: string;
      status: number;
    }
  | {
      ok: false;
      kind: DispatchFailureKind;
      message: string;
      automatorId?: string;
      automatorName?: string;
      url?: string;
      status?: number;
    };

export type AutomatorSelection =
  | { ok: true; automator: AutomatorConfig }
  | { ok: false; reason: 'not-found' | 'none' | 'ambiguous'; message: string };

// ── URL helpers ──

export function normalizeBaseUrl(raw: string): string {
  let url = raw.trim();
  if (!url) return '';
  if (!url.startsWith('http://') && !url.startsWith('https://')) {
    url = `http://${url}`;
  }
  return url.replace(/\/+$/, '');
}

export function buildTriggerUrl(baseUrl: string, itemType: ItemType, itemId: string): string {
  const id = encodeURIComponent(itemId);
  switch (itemType) {
    case 'button':
      return `${baseUrl}/api/trigger/button/${id}`;
    case 'shortcut':
      return `${baseUrl}/api/trigger/shortcut/${id}`;
    default:
      return `${baseUrl}/api/macro/${id}`;
  }
}

/**
 * Picks the target instance. With an id the match must exist; without one,
 * exactly one candidate must exist. `enabledOnly` restricts candidates when no id is given.
 */
export function selectAutomator(
  automators: readonly AutomatorConfig[],
  automatorId: string | undefined,
  enabledOnly: boolean,
): AutomatorSelection {
  if (automatorId) {
    const automator = automators.find((a) => a.id === automatorId);
    return automator
      ? { ok: true, automator }
      : { ok: false, reason: 'not-found', message: `Automator ${automatorId} not found` };
  }

  const candidates = enabledOnly ? automators.filter((a) => a.enabled) : automators;
  if (candidates.length === 1) {
    return { ok: true, automator: candidates[0] };
  }
  if (candidates.length === 0) {
    return { ok: false, reason: 'none', message: 'No Automator specified and none is available' };
  }
  return {
    ok: false,
    reason: 'ambiguous',
    message: `No Automator specified and ${candidates.length} are available: ${candidates.map((a) => a.id).join(', ')}`,
  };
}

// ── Failure classification ──

function errorCode(error: unknown): string | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < 5; depth++) {
    if (typeof current !== 'object' || current === null) return undefined;
    if ('code' in current && typeof current.code === 'string') return current.code;
    if ('errors' in current && Array.isArray(current.errors) && current.errors.length > 0) {
      current = current.errors[0];
      continue;
    }
    current = 'cause' in current ? current.cause : undefined;
  }
  return undefined;
}

export type RequestFailure = 'timeout' | 'unreachable' | 'other';

export function classifyRequestError(error: unknown): RequestFailure {
  if (typeof error === 'object' && error !== null && 'name' in error) {
    if (error.name === 'TimeoutError' || error.name === 'AbortError') return 'timeout';
  }
  const code = errorCode(error);
  if (code && TIMEOUT_CODES.has(code)) return 'timeout';
  if (code && UNREACHABLE_CODES.has(code)) return 'unreachable';
  return 'other';
}

function describeRequestError(error: unknown): string {
  const code = errorCode(error);
  const message = errorMessage(error);
  return code && !message.includes(code) ? `${message} (${code})` : message;
}

/**
 * Caps concurrent requests across every origin. A released slot is handed
 * straight to the next waiter so the cap holds under contention.
 */
class RequestGate {
  private active = 0;
  private readonly waiting: Array<() => void> = [];

  constructor(private readonly limit: number) {}

  async run<T>(task: () => Promise<T>): Promise<T> {
    if (this.active >= this.limit) {
      await new Promise<void>((resolve) => this.waiting.push(resolve));
    } else {
      this.active++;
    }
    try {
      return await task();
    } finally {
      const next = this.waiting.shift();
      if (next) {
        next();
      } else {
        this.active--;
      }
    }
  }

  get inFlight(): number {
    return this.active;
  }
}

/**
 * Outbound HTTP side of the bridge. One instance owns one keep-alive
 * connection pool for the lifetime of the process; close() releases it.
 */
export class AutomatorClient {
  private readonly agent: Agent;
  private readonly gate: RequestGate;
  private readonly timeoutMs: number;
  private readonly healthTimeoutMs: number;
  private closed = false;

  constructor(
    private readonly getAutomators: () => readonly AutomatorConfig[],
    private readonly events: EventLog,
    options: AutomatorClientOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.healthTimeoutMs = options.healthTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.gate = new RequestGate(options.maxInFlight ?? DEFAULT_MAX_IN_FLIGHT);
    this.agent = new Agent({
      connections: options.connectionsPerOrigin ?? DEFAULT_CONNECTIONS_PER_ORIGIN,
      keepAliveTimeout: 30_000,
      connect: { timeout: this.timeoutMs },
    });
  }

  get inFlight(): number {
    return this.gate.inFlight;
  }

  private async get(url: string, timeoutMs: number) {
    if (this.closed) {
      throw new Error('Automator client is closed');
    }
    return this.gate.run(() =>
      fetch(url, {
        method: 'GET',
        dispatcher: this.agent,
        signal: AbortSignal.timeout(timeoutMs),
      }),
    );
  }

  async trigger(request: DispatchRequest): Promise<DispatchOutcome> {
    const itemName = request.itemName || request.itemId;
    const selection = selectAutomator(this.getAutomators(), request.automatorId, true);
    if (!selection.ok) {
      this.events.record('config-error', selection.message);
      return { ok: false, kind: 'configuration', message: selection.message };
    }

    const automator = selection.automator;
    const identity = { automatorId: automator.id, automatorName: automator.name };

    if (!automator.enabled) {
      const message = `${automator.name} is disabled`;
      this.events.record('config-error', message);
      return { ok: false, kind: 'configuration', message, ...identity };
    }

    const baseUrl = normalizeBaseUrl(automator.url);
    if (!baseUrl) {
      const message = `${automator.name} URL not configured`;
      this.events.record('config-error', message);
      return { ok: false, kind: 'configuration', message, ...identity };
    }

    const url = buildTriggerUrl(baseUrl, request.itemType, request.itemId);
    this.events.record('dispatch', `[${automator.name}] Calling ${request.itemType}: ${itemName}`);

    try {
      const response = await this.get(url, this.timeoutMs);
      // Drain the body so the connection goes back to the pool.
      await response.arrayBuffer();

      if (!response.ok) {
        const message = `HTTP ${response.status}`;
        this.events.record(
          'http-error',
          `[${automator.name}] Failed to trigger ${request.itemType} ${itemName}: ${message}`,
        );
        return { ok: false, kind: 'http-status', message, status: response.status, url, ...identity };
      }

      this.events.record('dispatch-success', `[${automator.name}] Triggered ${request.itemType}: ${itemName}`);
      return { ok: true, status: response.status, url, ...identity };
    } catch (error) {
      const failure = classifyRequestError(error);
      const message =
        failure === 'timeout' ? `timed out after ${this.timeoutMs}ms` : describeRequestError(error);
      this.events.record(
        'transport-error',
        `[${automator.name}] Failed to trigger ${request.itemType} ${itemName}: ${message}`,
      );
      return {
        ok: false,
        kind: failure === 'timeout' ? 'timeout' : 'transport',
        message,
        url,
        ...identity,
      };
    }
  }

  async checkConnection(automatorId?: string): Promise<ConnectionStatus> {
    const lastCheck = new Date().toISOString();
    const selection = selectAutomator(this.getAutomators(), automatorId, false);
    if (!selection.ok) {
      return {
        connected: false,
        last_check: lastCheck,
        error: selection.reason === 'not-found' ? 'Automator not found' : 'No Automator specified',
      };
    }

    const automator = selection.automator;
    const base = { last_check: lastCheck, automator_id: automator.id, automator_name: automator.name };
    const baseUrl = normalizeBaseUrl(automator.url);
    if (!automator.enabled || !baseUrl) {
      return { connected: false, error: 'Not configured', ...base };
    }

    try {
      const response = await this.get(`${baseUrl}${STATUS_PATH}`, this.healthTimeoutMs);
      await response.arrayBuffer();
      if (!response.ok) {
        return { connected: false, error: `HTTP error: ${response.status}`, ...base };
      }
      return { connected: true, error: null, ...base };
    } catch (error) {
      switch (classifyRequestError(error)) {
        case 'timeout':
          return { connected: false, error: 'Connection timeout - check if Automator is running', ...base };
        case 'unreachable':
          return { connected: false, error: 'Cannot connect - check URL and port', ...base };
        default: {
          const message = errorMessage(error);
          const short = message.includes('(') ? message.split('(')[0].trim() : message;
          return { connected: false, error: short.slice(0, 100), ...base };
        }
      }
    }
  }

  /**
   * Fetches one catalog list. Throws on transport errors, non-2xx answers and
   * bodies that are not JSON arrays; the catalog cache treats each list separately.
   */
  async fetchItems(automator: AutomatorConfig, list: CatalogListKey): Promise<unknown[]> {
    const baseUrl = normalizeBaseUrl(automator.url);
    if (!baseUrl) {
      throw new Error(`${automator.name} URL not configured`);
    }

    const response = await this.get(`${baseUrl}${LIST_PATHS[list]}`, this.timeoutMs);
    if (!response.ok) {
      await response.arrayBuffer();
      throw new Error(`HTTP ${response.status} fetching ${list}`);
    }

    const body: unknown = await response.json();
    if (!Array.isArray(body)) {
      throw new Error(`Unexpected ${list} payload: expected an array`);
    }
    logger.debug(`Fetched ${body.length} ${list} from ${automator.name}`);
    return body;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.agent.close();
  }
}
