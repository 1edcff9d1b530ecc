import { Router, type NextFunction, type Request, type Response } from 'express';
import { z, ZodError } from 'zod';
import type { Bridge } from '../services/bridge.js';
import {
  applyConfigUpdate,
  automatorSchema,
  configUpdateSchema,
  generateAutomatorId,
  importConfigSections,
  parseItemType,
} from '../services/configStore.js';
import { selectAutomator } from '../services/automatorClient.js';
import { CATALOG_LISTS } from '../services/catalogCache.js';
import { DEFAULT_RECENT_EVENTS, MAX_LOG_ENTRIES } from '../services/eventLog.js';
import { ConfigurationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

type RouteHandler = (req: Request, res: Response) => void | Promise<void>;

const logger = createLogger('api');

const automatorQuery = z.object({
  automator_id: z.string().trim().min(1).optional(),
});

const triggerQuery = automatorQuery.extend({
  item_type: z.string().optional().transform((v) => (v ? parseItemType(v) : 'macro')),
});

const deleteQuery = z.object({
  delete_mappings: z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((v) => v === undefined || v === 'true' || v === '1'),
});

const importBody = z.record(z.unknown());

const eventsQuery = z.object({
  limit: z.coerce.number().int().min(1).max(MAX_LOG_ENTRIES).default(DEFAULT_RECENT_EVENTS),
});

function route(handler: RouteHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve()
      .then(() => handler(req, res))
      .catch(next);
  };
}

function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Last middleware of the API. Configuration and validation problems are the
 * caller's to fix; anything else is logged and answered with 500.
 */
export function apiErrorHandler(error: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (error instanceof ZodError) {
    res.status(400).json({ error: formatZodError(error) });
    return;
  }
  if (error instanceof ConfigurationError) {
    res.status(error.status).json({ error: error.message });
    return;
  }
  if (error instanceof SyntaxError) {
    res.status(400).json({ error: `Invalid JSON body: ${error.message}` });
    return;
  }
  logger.error('Unhandled API error', error);
  res.status(500).json({ error: error instanceof Error ? error.message : 'Internal error' });
}

export function createApiRouter(bridge: Bridge): Router {
  const router = Router();

  // ── Status ──

  router.get('/api/status', (_req, res) => {
    res.json(bridge.status());
  });

  router.get('/events', (req, res) => {
    const { limit } = eventsQuery.parse(req.query);
    res.json({ events: bridge.events.recent(limit) });
  });

  // ── Configuration ──

  router.get('/api/config', (_req, res) => {
    res.json(bridge.getConfig());
  });

  router.post(
    '/api/config',
    route(async (req, res) => {
      const update = configUpdateSchema.parse(req.body);
      const next = applyConfigUpdate(bridge.getConfig(), update);
      const report = await bridge.updateConfig(next);

      if (update.tcp_listeners) bridge.events.record('config', `Updated TCP listeners (${update.tcp_listeners.length} listeners)`);
      if (update.tcp_commands) bridge.events.record('config', `Updated TCP commands (${update.tcp_commands.length} commands)`);
      if (update.automators) bridge.events.record('config', `Updated Automators (${update.automators.length} configured)`);
      if (update.command_mappings) bridge.events.record('config', `Updated command mappings (${update.command_mappings.length} mappings)`);
      if (update.web_port !== undefined) bridge.events.record('config', `Updated web port to ${update.web_port}`);

      res.json({ success: true, config_version: bridge.getSnapshot().version, listeners: report });
    }),
  );

  router.get('/config/export', (_req, res) => {
    res.json(bridge.getConfig());
  });

  router.post(
    '/config/import',
    route(async (req, res) => {
      const update = importConfigSections(importBody.parse(req.body));
      const report = await bridge.updateConfig(applyConfigUpdate(bridge.getConfig(), update));
      bridge.events.record('config', 'Configuration imported successfully');
      res.json({
        ok: true,
        message: 'Configuration imported successfully',
        config_version: bridge.getSnapshot().version,
        listeners: report,
      });
    }),
  );

  // ── Automator instances ──

  router.get('/api/automators', (_req, res) => {
    res.json({ automators: bridge.getConfig().automators });
  });

  router.post(
    '/api/automators',
    route(async (req, res) => {
      const automator = automatorSchema.parse(req.body);
      const config = bridge.getConfig();
      if (!automator.id) {
        automator.id = generateAutomatorId();
      }
      if (config.automators.some((a) => a.id === automator.id)) {
        throw new ConfigurationError('Automator ID already exists');
      }

      await bridge.updateConfig({ ...config, automators: [...config.automators, automator] });
      bridge.events.record('config', `Added Automator: ${automator.name}`);
      res.json({ success: true, automator });
    }),
  );

  router.put(
    '/api/automators/:id',
    route(async (req, res) => {
      const id = req.params['id'];
      const automator = { ...automatorSchema.parse(req.body), id };
      const config = bridge.getConfig();
      if (!config.automators.some((a) => a.id === id)) {
        throw new ConfigurationError('Automator not found', 404);
      }

      await bridge.updateConfig({
        ...config,
        automators: config.automators.map((a) => (a.id === id ? automator : a)),
      });
      bridge.events.record('config', `Updated Automator: ${automator.name}`);
      res.json({ success: true, automator });
    }),
  );

  router.delete('/api/automators/:id', (req, res) => {
    const id = req.params['id'];
    const config = bridge.getConfig();
    const automator = config.automators.find((a) => a.id === id);
    if (!automator) {
      throw new ConfigurationError('Automator not found', 404);
    }

    const orphaned = config.command_mappings.filter((m) => m.automator_id === id);
    res.json({
      automator,
      orphaned_mappings: orphaned,
      count: orphaned.length,
      requires_confirmation: orphaned.length > 0,
    });
  });

  router.post(
    '/api/automators/:id/delete',
    route(async (req, res) => {
      const id = req.params['id'];
      const { delete_mappings: deleteMappings } = deleteQuery.parse(req.query);
      const config = bridge.getConfig();
      if (!config.automators.some((a) => a.id === id)) {
        throw new ConfigurationError('Automator not found', 404);
      }

      const mappings = deleteMappings
        ? config.command_mappings.filter((m) => m.automator_id !== id)
        : config.command_mappings;
      const deleted = config.command_mappings.length - mappings.length;

      await bridge.updateConfig({
        ...config,
        automators: config.automators.filter((a) => a.id !== id),
        command_mappings: mappings,
      });
      bridge.catalog.remove(id);
      bridge.events.record('config', `Deleted Automator: ${id} (${deleted} mappings removed)`);
      res.json({ success: true, deleted_mappings: deleted });
    }),
  );

  // ── Automator operations ──

  router.get(
    '/api/automator/test',
    route(async (req, res) => {
      const { automator_id: automatorId } = automatorQuery.parse(req.query);
      res.json(await bridge.checkConnection(automatorId));
    }),
  );

  router.post(
    '/api/automator/refresh',
    route(async (req, res) => {
      const { automator_id: automatorId } = automatorQuery.parse(req.query);
      const catalog = await bridge.refreshCatalog(automatorId);
      const count = CATALOG_LISTS.reduce((sum, list) => sum + catalog[list].length, 0);
      res.json({
        ok: true,
        automator_id: catalog.automator_id,
        count,
        last_updated: catalog.last_updated,
        message: `Loaded ${count} items`,
      });
    }),
  );

  router.get('/api/automator/catalog', (req, res) => {
    const { automator_id: automatorId } = automatorQuery.parse(req.query);
    const selection = selectAutomator(bridge.getSnapshot().automators, automatorId, false);
    if (!selection.ok) {
      throw new ConfigurationError(selection.message, selection.reason === 'not-found' ? 404 : 400);
    }
    res.json(bridge.catalog.get(selection.automator.id));
  });

  router.post(
    '/api/automator/trigger/:itemId',
    route(async (req, res) => {
      const itemId = req.params['itemId'];
      const { automator_id: automatorId, item_type: itemType } = triggerQuery.parse(req.query);
      const outcome = await bridge.trigger({ itemId, itemType, automatorId });
      if (!outcome.ok && outcome.kind === 'configuration') {
        throw new ConfigurationError(outcome.message);
      }
      res.json({ success: outcome.ok, item_id: itemId, type: itemType, outcome });
    }),
  );

  // ── Capture ──

  router.post('/tcp/capture/start', (_req, res) => {
    bridge.capture.start();
    bridge.events.record('capture', 'Started listening for TCP command');
    res.json({ status: 'listening', message: 'Waiting for next TCP command...' });
  });

  router.get('/tcp/capture/status', (_req, res) => {
    const state = bridge.capture.poll();
    res.json(state.status === 'captured' ? state : { status: state.status, data: null });
  });

  router.post('/tcp/capture/cancel', (_req, res) => {
    bridge.capture.cancel();
    bridge.events.record('capture', 'Cancelled');
    res.json({ status: 'cancelled' });
  });

  return router;
}
