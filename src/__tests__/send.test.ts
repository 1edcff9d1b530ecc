import { describe, it, expect, afterEach } from 'vitest';
import { createServer, type Server } from 'node:net';
import { sendTriggers } from '../commands/send.js';
import { getFreePort, waitFor } from './helpers.js';

describe('sendTriggers', () => {
  let server: Server | undefined;

  afterEach(async () => {
    const current = server;
    server = undefined;
    if (current) {
      await new Promise<void>((resolve) => current.close(() => resolve()));
    }
  });

  async function listen(): Promise<{ port: number; received: () => string }> {
    let data = '';
    server = createServer((socket) => {
      socket.setEncoding('utf-8');
      socket.on('data', (chunk: string) => {
        data += chunk;
      });
    });
    const port = await getFreePort();
    const current = server;
    await new Promise<void>((resolve) => current.listen(port, '127.0.0.1', () => resolve()));
    return { port, received: () => data };
  }

  it('should write one line per trigger over a single connection', async () => {
    const target = await listen();

    const sent = await sendTriggers(['LIGHT_ON', 'FADE'], { host: '127.0.0.1', port: target.port, delayMs: 5 });

    expect(sent).toBe(2);
    await waitFor(() => target.received() === 'LIGHT_ON\nFADE\n');
  });

  it('should fail when nothing is listening', async () => {
    const port = await getFreePort();

    await expect(sendTriggers(['LIGHT_ON'], { host: '127.0.0.1', port })).rejects.toThrow(
      `Cannot connect to 127.0.0.1:${port}`,
    );
  });
});
