import { connect, type Socket } from 'node:net';
import { setTimeout as sleep } from 'node:timers/promises';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('send');

export const DEFAULT_SEND_HOST = 'localhost';
export const DEFAULT_SEND_PORT = 9001;

export interface SendOptions {
  host?: string;
  port?: number;
  /** Pause between consecutive triggers. */
  delayMs?: number;
  connectTimeoutMs?: number;
}

function connectSocket(host: string, port: number, timeoutMs: number): Promise<Socket> {
  return new Promise((resolve, reject) => {
    const socket = connect({ host, port });
    const timer = setTimeout(() => {
      socket.destroy();
      reject(new Error(`Connection to ${host}:${port} timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    socket.once('connect', () => {
      clearTimeout(timer);
      socket.off('error', onError);
      resolve(socket);
    });
    const onError = (error: Error) => {
      clearTimeout(timer);
      reject(new Error(`Cannot connect to ${host}:${port}: ${error.message}`));
    };
    socket.once('error', onError);
  });
}

function writeLine(socket: Socket, line: string): Promise<void> {
  return new Promise((resolve, reject) => {
    socket.write(`${line}\n`, 'utf-8', (error) => (error ? reject(error) : resolve()));
  });
}

/**
 * Sends each trigger as one line over a single connection, the way hardware
 * controllers do. Nothing is read back.
 */
export async function sendTriggers(triggers: string[], options: SendOptions = {}): Promise<number> {
  const host = options.host ?? DEFAULT_SEND_HOST;
  const port = options.port ?? DEFAULT_SEND_PORT;
  const socket = await connectSocket(host, port, options.connectTimeoutMs ?? 3000);
  // Write failures surface through the write callbacks.
  socket.on('error', (error) => logger.debug(`Connection to ${host}:${port}: ${error.message}`));

  let sent = 0;
  try {
    for (const trigger of triggers) {
      if (sent > 0 && options.delayMs) {
        await sleep(options.delayMs);
      }
      await writeLine(socket, trigger);
      sent++;
    }
  } finally {
    if (!socket.destroyed) {
      await new Promise<void>((resolve) => socket.end(() => resolve()));
    }
    socket.destroy();
  }
  return sent;
}
