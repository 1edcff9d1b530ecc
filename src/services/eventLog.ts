import type { EventEntry, EventKind } from '../types/index.js';
import { createLogger, type Logger } from '../utils/logger.js';

export const MAX_LOG_ENTRIES = 200;
export const DEFAULT_RECENT_EVENTS = 100;

const KIND_LABELS: Record<EventKind, string> = {
  system: 'System',
  config: 'Config',
  listener: 'TCP Server',
  'listener-warning': 'TCP Warning',
  'listener-error': 'TCP Error',
  received: 'TCP Command',
  capture: 'TCP Capture',
  'no-command': 'TCP Warning',
  'no-mapping': 'TCP Warning',
  'mapping-error': 'Mapping Error',
  'mapping-found': 'Mapping Found',
  dispatch: 'HTTP Trigger',
  'dispatch-success': 'HTTP Success',
  'config-error': 'Automator Error',
  'transport-error': 'HTTP Error',
  'http-error': 'HTTP Error',
  catalog: 'Catalog',
};

const WARN_KINDS = new Set<EventKind>(['listener-warning', 'no-command', 'no-mapping']);
const ERROR_KINDS = new Set<EventKind>([
  'listener-error',
  'mapping-error',
  'config-error',
  'transport-error',
  'http-error',
]);

function pad(n: number): string {
  return n.toString().padStart(2, '0');
}

export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Append-only operator log of resolution and dispatch activity. Oldest entries
 * are dropped once the limit is passed. Each entry is mirrored to the process logger.
 */
export class EventLog {
  private entries: EventEntry[] = [];

  constructor(
    private readonly maxEntries: number = MAX_LOG_ENTRIES,
    private readonly logger: Logger = createLogger('events'),
    private readonly now: () => Date = () => new Date(),
  ) {}

  record(kind: EventKind, detail: string): EventEntry {
    const at = this.now();
    const entry: EventEntry = {
      at: at.toISOString(),
      kind,
      detail,
      line: `[${formatTimestamp(at)}] ${KIND_LABELS[kind]}: ${detail}`,
    };

    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries.splice(0, this.entries.length - this.maxEntries);
    }

    const message = `${KIND_LABELS[kind]}: ${detail}`;
    if (ERROR_KINDS.has(kind)) {
      this.logger.error(message);
    } else if (WARN_KINDS.has(kind)) {
      this.logger.warn(message);
    } else {
      this.logger.info(message);
    }

    return entry;
  }

  recent(limit: number = DEFAULT_RECENT_EVENTS): EventEntry[] {
    if (limit <= 0) return [];
    return this.entries.slice(-limit);
  }

  size(): number {
    return this.entries.length;
  }

  clear(): void {
    this.entries = [];
  }
}
