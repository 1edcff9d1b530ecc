import type {
  Catalog,
  ConfigDocument,
  ConfigSnapshot,
  ConnectionStatus,
  ItemType,
} from '../types/index.js';
import { buildSnapshot } from './configStore.js';
import { EventLog, MAX_LOG_ENTRIES } from './eventLog.js';
import { CaptureSession } from './captureSession.js';
import { CatalogCache, type RefreshOptions } from './catalogCache.js';
import {
  AutomatorClient,
  type AutomatorClientOptions,
  type DispatchOutcome,
} from './automatorClient.js';
import { resolveTrigger, type Resolution } from './commandResolver.js';
import { ListenerManager, type ReconcileReport } from './listenerManager.js';

export interface BridgeOptions {
  config: ConfigDocument;
  cachePath: string;
  /** Called with every accepted configuration update, e.g. to save it. */
  persist?: (config: ConfigDocument) => void;
  listenHost?: string;
  client?: AutomatorClientOptions;
  maxEvents?: number;
}

export interface ListenerStatus {
  name: string;
  enabled: boolean;
  running: boolean;
  connections: number;
}

export interface AutomatorStatus {
  id: string;
  name: string;
  enabled: boolean;
  url: string;
  connection: ConnectionStatus | null;
}

export interface BridgeStatus {
  uptime: number;
  config_version: number;
  tcp_listeners: Record<string, ListenerStatus>;
  automators: AutomatorStatus[];
  capture_active: boolean;
  warnings: readonly string[];
}

export interface ManualTrigger {
  itemId: string;
  itemType: ItemType;
  automatorId?: string;
  itemName?: string;
}

/**
 * The running service: holds the current configuration snapshot and routes
 * every received trigger through capture, resolution and dispatch.
 */
export class Bridge {
  readonly events: EventLog;
  readonly capture = new CaptureSession();
  readonly client: AutomatorClient;
  readonly catalog: CatalogCache;
  readonly listeners: ListenerManager;

  private config: ConfigDocument;
  private snapshot: ConfigSnapshot;
  private readonly persist: (config: ConfigDocument) => void;
  private readonly connectivity = new Map<string, ConnectionStatus>();
  private readonly startedAt = Date.now();

  constructor(options: BridgeOptions) {
    this.config = options.config;
    this.snapshot = buildSnapshot(options.config, 1);
    this.persist = options.persist ?? (() => undefined);
    this.events = new EventLog(options.maxEvents ?? MAX_LOG_ENTRIES);
    this.client = new AutomatorClient(() => this.snapshot.automators, this.events, options.client);
    this.catalog = new CatalogCache(options.cachePath, this.client, () => this.snapshot.automators, this.events);
    this.listeners = new ListenerManager(
      (line, port, source) => this.handleLine(line, port, source),
      this.events,
      { host: options.listenHost },
    );
  }

  getSnapshot(): ConfigSnapshot {
    return this.snapshot;
  }

  getConfig(): ConfigDocument {
    return structuredClone(this.config);
  }

  async start(): Promise<ReconcileReport> {
    this.events.record('system', 'Starting automator bridge');
    this.catalog.load();
    this.reportWarnings();
    const report = await this.listeners.reconcile(this.snapshot.listeners);
    this.events.record('system', 'Startup complete');
    return report;
  }

  async stop(): Promise<void> {
    this.events.record('system', 'Shutting down');
    await this.listeners.stopAll();
    await this.client.close();
  }

  /**
   * Swaps in a new configuration. Readers holding the old snapshot keep a
   * consistent view; listeners are reconciled against the new one.
   */
  async updateConfig(next: ConfigDocument): Promise<ReconcileReport> {
    this.persist(next);
    this.config = structuredClone(next);
    this.snapshot = buildSnapshot(this.config, this.snapshot.version + 1);
    for (const id of this.connectivity.keys()) {
      if (!this.snapshot.automators.some((a) => a.id === id)) {
        this.connectivity.delete(id);
      }
    }
    this.reportWarnings();
    return this.listeners.reconcile(this.snapshot.listeners);
  }

  private reportWarnings(): void {
    for (const warning of this.snapshot.warnings) {
      this.events.record('config', `Warning: ${warning}`);
    }
  }

  resolve(trigger: string, port: number): Resolution {
    return resolveTrigger(this.snapshot, trigger, port, (automatorId, itemId) =>
      this.catalog.findItem(automatorId, itemId),
    );
  }

  async handleLine(line: string, port: number, source: string): Promise<void> {
    this.events.record('received', `Received '${line}' on port ${port}`);

    if (this.capture.offer(line, port, source)) {
      this.events.record('capture', `Captured command '${line}' from port ${port}`);
    }

    const resolution = this.resolve(line, port);
    if (!resolution.matched) {
      this.events.record(resolution.reason, resolution.message);
      return;
    }

    const commandName = resolution.command.name || resolution.command.id;
    const inferred = resolution.inferred ? ` (type ${resolution.itemType} inferred)` : '';
    this.events.record('mapping-found', `${commandName} → ${resolution.itemName}${inferred}`);

    await this.client.trigger({
      automatorId: resolution.automatorId,
      itemId: resolution.itemId,
      itemName: resolution.itemName,
      itemType: resolution.itemType,
    });
  }

  trigger(request: ManualTrigger): Promise<DispatchOutcome> {
    return this.client.trigger({
      automatorId: request.automatorId,
      itemId: request.itemId,
      itemName: request.itemName ?? `Manual trigger: ${request.itemId}`,
      itemType: request.itemType,
    });
  }

  async checkConnection(automatorId?: string): Promise<ConnectionStatus> {
    const status = await this.client.checkConnection(automatorId);
    if (status.automator_id) {
      this.connectivity.set(status.automator_id, status);
    }
    return status;
  }

  refreshCatalog(automatorId?: string, options?: RefreshOptions): Promise<Catalog> {
    return this.catalog.refresh(automatorId, options);
  }

  status(): BridgeStatus {
    const snapshot = this.snapshot;
    const tcpListeners: Record<string, ListenerStatus> = {};
    for (const listener of snapshot.listeners) {
      tcpListeners[String(listener.port)] = {
        name: listener.name,
        enabled: listener.enabled,
        running: this.listeners.isRunning(listener.port),
        connections: this.listeners.connectionCount(listener.port),
      };
    }

    return {
      uptime: Math.floor((Date.now() - this.startedAt) / 1000),
      config_version: snapshot.version,
      tcp_listeners: tcpListeners,
      automators: snapshot.automators.map((a) => ({
        id: a.id,
        name: a.name,
        enabled: a.enabled,
        url: a.url,
        connection: this.connectivity.get(a.id) ?? null,
      })),
      capture_active: this.capture.isListening(),
      warnings: snapshot.warnings,
    };
  }
}
