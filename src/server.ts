import express, { type Express } from 'express';
import type { Server } from 'node:http';
import type { Bridge } from './services/bridge.js';
import { apiErrorHandler, createApiRouter } from './handlers/apiRouter.js';
import { createLogger } from './utils/logger.js';

export const APP_VERSION = '1.1.0';
export const DEFAULT_API_HOST = '127.0.0.1';

const logger = createLogger('api');

export function createApp(bridge: Bridge, port: number): Express {
  const app = express();
  app.disable('x-powered-by');
  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', version: APP_VERSION, port });
  });

  app.use(createApiRouter(bridge));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });
  app.use(apiErrorHandler);

  return app;
}

export function startApiServer(app: Express, port: number, host: string = DEFAULT_API_HOST): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.once('error', reject);
    server.once('listening', () => {
      server.off('error', reject);
      logger.info(`Management API listening on http://${host}:${port}`);
      resolve(server);
    });
  });
}

export function closeApiServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
    server.closeAllConnections();
  });
}
