import { createServer, type Server, type Socket } from 'node:net';
import { createInterface } from 'node:readline';
import type { PeerInfo, TcpListenerConfig } from '../types/index.js';
import type { EventLog } from './eventLog.js';
import { createLogger, errorMessage } from '../utils/logger.js';

export const DEFAULT_LISTEN_HOST = '0.0.0.0';

const logger = createLogger('tcp');

export type LineHandler = (line: string, port: number, source: string) => Promise<void> | void;

export interface ListenerManagerOptions {
  host?: string;
}

export interface ReconcileReport {
  started: number[];
  stopped: number[];
  failed: Array<{ port: number; error: string }>;
}

interface ActiveListener {
  port: number;
  server: Server;
  sockets: Set<Socket>;
  peers: Map<number, PeerInfo>;
}

/**
 * Owns the live TCP listeners. Each accepted connection is read line by line;
 * a line is handed to the handler only after the previous line's handler has
 * settled, so triggers on one connection keep their order.
 */
export class ListenerManager {
  private readonly active = new Map<number, ActiveListener>();
  private readonly starting = new Set<number>();
  private queue: Promise<unknown> = Promise.resolve();
  private nextPeerId = 1;
  private readonly host: string;

  constructor(
    private readonly onLine: LineHandler,
    private readonly events: EventLog,
    options: ListenerManagerOptions = {},
  ) {
    this.host = options.host ?? DEFAULT_LISTEN_HOST;
  }

  /**
   * Binds a listener. Returns false when the port is already served here;
   * rejects when the bind fails, leaving the port unregistered.
   */
  async start(port: number): Promise<boolean> {
    if (this.active.has(port) || this.starting.has(port)) {
      this.events.record('listener-warning', `Server already running on port ${port}`);
      return false;
    }

    this.starting.add(port);
    const listener: ActiveListener = {
      port,
      server: createServer((socket) => this.accept(listener, socket)),
      sockets: new Set(),
      peers: new Map(),
    };

    try {
      await new Promise<void>((resolve, reject) => {
        const onError = (error: Error) => {
          listener.server.off('listening', onListening);
          reject(error);
        };
        const onListening = () => {
          listener.server.off('error', onError);
          resolve();
        };
        listener.server.once('error', onError);
        listener.server.once('listening', onListening);
        listener.server.listen(port, this.host);
      });
    } catch (error) {
      this.events.record('listener-error', `Failed to start server on port ${port}: ${errorMessage(error)}`);
      throw error;
    } finally {
      this.starting.delete(port);
    }

    listener.server.on('error', (error) => {
      this.events.record('listener-error', `Server on port ${port}: ${error.message}`);
    });
    this.active.set(port, listener);
    this.events.record('listener', `Started on port ${port}`);
    return true;
  }

  /**
   * Stops accepting, closes every peer on the port and waits for the socket
   * to be released. Returns false when nothing was running.
   */
  async stop(port: number): Promise<boolean> {
    const listener = this.active.get(port);
    if (!listener) {
      logger.debug(`No server running on port ${port}`);
      return false;
    }
    this.active.delete(port);

    const closed = new Promise<void>((resolve) => {
      listener.server.close(() => resolve());
    });
    for (const socket of listener.sockets) {
      socket.destroy();
    }
    await closed;

    this.events.record('listener', `Stopped on port ${port}`);
    return true;
  }

  reconcile(listeners: readonly TcpListenerConfig[]): Promise<ReconcileReport> {
    const run = this.queue.then(() => this.applyDesired(listeners));
    this.queue = run.catch((error) => logger.error('Listener reconciliation failed', error));
    return run;
  }

  stopAll(): Promise<void> {
    const run = this.queue.then(async () => {
      await Promise.all([...this.active.keys()].map((port) => this.stop(port)));
    });
    this.queue = run.catch((error) => logger.error('Stopping listeners failed', error));
    return run;
  }

  private async applyDesired(listeners: readonly TcpListenerConfig[]): Promise<ReconcileReport> {
    const desired = new Set<number>();
    const seen = new Set<number>();
    for (const listener of listeners) {
      if (seen.has(listener.port)) continue;
      seen.add(listener.port);
      if (listener.enabled) desired.add(listener.port);
    }

    const report: ReconcileReport = { started: [], stopped: [], failed: [] };

    for (const port of [...this.active.keys()]) {
      if (!desired.has(port) && (await this.stop(port))) {
        report.stopped.push(port);
      }
    }

    for (const port of desired) {
      if (this.active.has(port)) continue;
      try {
        if (await this.start(port)) report.started.push(port);
      } catch (error) {
        report.failed.push({ port, error: errorMessage(error) });
      }
    }

    return report;
  }

  private accept(listener: ActiveListener, socket: Socket): void {
    const peer: PeerInfo = {
      id: this.nextPeerId++,
      address: `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`,
      connectedAt: Date.now(),
    };
    listener.sockets.add(socket);
    listener.peers.set(peer.id, peer);
    logger.debug(`Client ${peer.address} connected on port ${listener.port}`);

    const lines = createInterface({ input: socket, crlfDelay: Infinity });

    socket.on('error', (error) => {
      logger.warn(`Connection ${peer.address} on port ${listener.port}: ${error.message}`);
    });
    socket.once('close', () => {
      listener.sockets.delete(socket);
      listener.peers.delete(peer.id);
      lines.close();
      logger.debug(`Client ${peer.address} disconnected from port ${listener.port}`);
    });

    void this.readLines(listener.port, lines, peer)
      .catch((error) => {
        logger.warn(`Read error from ${peer.address} on port ${listener.port}: ${errorMessage(error)}`);
      })
      .finally(() => socket.destroy());
  }

  private async readLines(
    port: number,
    lines: AsyncIterable<string>,
    peer: PeerInfo,
  ): Promise<void> {
    for await (const raw of lines) {
      const line = raw.trim();
      if (!line) continue;
      try {
        await this.onLine(line, port, peer.address);
      } catch (error) {
        logger.error(`Error handling '${line}' from ${peer.address}`, error);
      }
    }
  }

  isRunning(port: number): boolean {
    return this.active.has(port);
  }

  runningPorts(): number[] {
    return [...this.active.keys()].sort((a, b) => a - b);
  }

  connectionCount(port: number): number {
    return this.active.get(port)?.peers.size ?? 0;
  }

  peers(port: number): PeerInfo[] {
    return [...(this.active.get(port)?.peers.values() ?? [])];
  }
}
