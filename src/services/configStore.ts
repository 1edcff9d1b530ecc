import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { randomBytes } from 'node:crypto';
import { z } from 'zod';
import type {
  AutomatorConfig,
  CommandMapping,
  ConfigDocument,
  ConfigSnapshot,
  ItemType,
  TcpCommandConfig,
  TcpListenerConfig,
} from '../types/index.js';
import { ITEM_TYPES } from '../types/index.js';
import { createLogger } from '../utils/logger.js';

export const CONFIG_VERSION = '1.1.0';
export const DEFAULT_WEB_PORT = 3114;

const CONFIG_FILE_NAME = 'config.json';
const CACHE_FILE_NAME = 'automator_cache.json';

const logger = createLogger('config');

export function getConfigDir(): string {
  return process.env['AUTOMATOR_BRIDGE_HOME'] || join(homedir(), '.automator-bridge');
}

export function getConfigPath(): string {
  return join(getConfigDir(), CONFIG_FILE_NAME);
}

export function getCachePath(): string {
  return join(getConfigDir(), CACHE_FILE_NAME);
}

function ensureConfigDir(): void {
  const dir = getConfigDir();
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

export function parseItemType(value: string): ItemType {
  const normalized = value.trim().toLowerCase();
  return ITEM_TYPES.find((t) => t === normalized) ?? 'unknown';
}

export function generateAutomatorId(): string {
  return `auto_${randomBytes(4).toString('hex')}`;
}

// ── Schemas ──

function renameLegacyFields(aliases: Record<string, string>) {
  return (value: unknown): unknown => {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) return value;
    const renamed: Record<string, unknown> = { ...value };
    for (const [legacy, current] of Object.entries(aliases)) {
      if (legacy in renamed) {
        if (renamed[current] === undefined) renamed[current] = renamed[legacy];
        delete renamed[legacy];
      }
    }
    return renamed;
  };
}

const idSchema = z.union([z.string(), z.number()]).transform((v) => String(v));

export const itemTypeSchema = z
  .string()
  .nullish()
  .transform((v) => (v ? parseItemType(v) : undefined));

export const listenerSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535),
  name: z.string().default(''),
  enabled: z.boolean().default(true),
});

export const commandSchema = z.preprocess(
  renameLegacyFields({ tcp_trigger: 'trigger' }),
  z.object({
    id: idSchema.pipe(z.string().min(1)),
    name: z.string().default(''),
    trigger: z.string(),
    description: z.string().nullish().transform((v) => v ?? ''),
  }),
);

export const automatorSchema = z.object({
  id: z.string().default(''),
  name: z.string().default(''),
  url: z.string().default(''),
  api_key: z.string().nullish().transform((v) => v ?? ''),
  enabled: z.boolean().default(true),
});

export const mappingSchema = z.preprocess(
  renameLegacyFields({
    automator_macro_id: 'target_item_id',
    automator_macro_name: 'target_item_name',
    automator_macro_type: 'item_type',
  }),
  z.object({
    tcp_command_id: idSchema,
    automator_id: z.string().nullish().transform((v) => v ?? ''),
    target_item_id: idSchema,
    target_item_name: z.string().nullish().transform((v) => v ?? ''),
    item_type: itemTypeSchema,
  }),
);

export const configSchema = z.object({
  config_version: z.string().default(CONFIG_VERSION),
  web_port: z.coerce.number().int().min(1).max(65535).default(DEFAULT_WEB_PORT),
  first_run: z.boolean().default(true),
  tcp_listeners: z.array(listenerSchema).default([]),
  tcp_commands: z.array(commandSchema).default([]),
  automators: z.array(automatorSchema).default([]),
  command_mappings: z.array(mappingSchema).default([]),
});

export const configUpdateSchema = z.object({
  tcp_listeners: z.array(listenerSchema).optional(),
  tcp_commands: z.array(commandSchema).optional(),
  automators: z.array(automatorSchema).optional(),
  command_mappings: z.array(mappingSchema).optional(),
  web_port: z.coerce.number().int().min(1).max(65535).optional(),
  first_run: z.boolean().optional(),
});

export type ConfigUpdate = z.infer<typeof configUpdateSchema>;

export function defaultConfig(): ConfigDocument {
  return {
    config_version: CONFIG_VERSION,
    web_port: DEFAULT_WEB_PORT,
    first_run: true,
    tcp_listeners: [],
    tcp_commands: [],
    automators: [],
    command_mappings: [],
  };
}

export function parseConfig(raw: unknown): ConfigDocument {
  return configSchema.parse(raw);
}

// ── Migration ──

function compareVersions(a: string, b: string): number {
  const pa = a.split('.').map((p) => parseInt(p, 10) || 0);
  const pb = b.split('.').map((p) => parseInt(p, 10) || 0);
  for (let i = 0; i < Math.max(pa.length, pb.length); i++) {
    const diff = (pa[i] ?? 0) - (pb[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

function asRecord(value: unknown): Record<string, unknown> | undefined {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    ? { ...value }
    : undefined;
}

export function needsMigration(raw: Record<string, unknown>): boolean {
  const version = typeof raw['config_version'] === 'string' ? raw['config_version'] : '1.0.0';
  return compareVersions(version, CONFIG_VERSION) < 0 || 'automator' in raw;
}

/**
 * Upgrades a 1.0.x document, which held a single `automator` object, to the
 * multi-instance layout. Mappings are linked to the migrated instance.
 */
export function migrateConfig(
  raw: Record<string, unknown>,
  newId: () => string = generateAutomatorId,
): Record<string, unknown> {
  const migrated: Record<string, unknown> = {
    config_version: CONFIG_VERSION,
    web_port: raw['web_port'] ?? DEFAULT_WEB_PORT,
    first_run: false,
    tcp_listeners: raw['tcp_listeners'] ?? [],
    tcp_commands: raw['tcp_commands'] ?? [],
    automators: [],
    command_mappings: [],
  };

  const legacy = asRecord(raw['automator']);
  const legacyUrl = typeof legacy?.['url'] === 'string' ? legacy['url'] : '';
  if (legacy && legacyUrl) {
    const automatorId = newId();
    migrated['automators'] = [
      {
        id: automatorId,
        name: 'Primary Automator',
        url: legacyUrl,
        api_key: typeof legacy['api_key'] === 'string' ? legacy['api_key'] : '',
        enabled: legacy['enabled'] === true,
      },
    ];

    const mappings = Array.isArray(raw['command_mappings']) ? raw['command_mappings'] : [];
    migrated['command_mappings'] = mappings.map((m: unknown) => {
      const mapping = asRecord(m) ?? {};
      mapping['automator_id'] = automatorId;
      if (!mapping['item_type'] && !mapping['automator_macro_type']) {
        mapping['item_type'] = 'macro';
      }
      return mapping;
    });
  } else if (Array.isArray(raw['automators'])) {
    migrated['automators'] = raw['automators'];
    migrated['command_mappings'] = raw['command_mappings'] ?? [];
  }

  return migrated;
}

const IMPORT_SECTIONS = [
  'web_port',
  'first_run',
  'tcp_listeners',
  'tcp_commands',
  'automators',
  'command_mappings',
] as const;

/**
 * Reads a backup body into an update holding only the sections it carries.
 * A legacy single-`automator` backup is migrated first and contributes the
 * migrated instance, plus its relinked mappings when it had any.
 */
export function importConfigSections(
  raw: Record<string, unknown>,
  newId: () => string = generateAutomatorId,
): ConfigUpdate {
  const legacy = 'automator' in raw;
  const source = legacy ? migrateConfig(raw, newId) : raw;
  const present = IMPORT_SECTIONS.filter((key) => key in raw || (legacy && key === 'automators'));
  return configUpdateSchema.parse(Object.fromEntries(present.map((key) => [key, source[key]])));
}

// ── Persistence ──

export function loadConfig(): ConfigDocument {
  ensureConfigDir();
  const path = getConfigPath();
  if (!existsSync(path)) {
    const config = defaultConfig();
    saveConfig(config);
    return config;
  }

  try {
    const content = readFileSync(path, 'utf-8');
    const raw = asRecord(JSON.parse(content));
    if (!raw) {
      throw new Error('configuration root must be an object');
    }

    if (needsMigration(raw)) {
      logger.info(`Migrating configuration to ${CONFIG_VERSION}`);
      const config = parseConfig(migrateConfig(raw));
      saveConfig(config);
      return config;
    }

    logger.info(`Configuration loaded from ${path}`);
    return parseConfig(raw);
  } catch (error) {
    logger.error(`Error loading config from ${path}`, error);
    return defaultConfig();
  }
}

export function saveConfig(config: ConfigDocument): void {
  ensureConfigDir();
  writeFileSync(getConfigPath(), JSON.stringify(config, null, 2), 'utf-8');
  logger.debug(`Configuration saved to ${getConfigPath()}`);
}

export function applyConfigUpdate(config: ConfigDocument, update: ConfigUpdate): ConfigDocument {
  return {
    ...config,
    tcp_listeners: update.tcp_listeners ?? config.tcp_listeners,
    tcp_commands: update.tcp_commands ?? config.tcp_commands,
    automators: update.automators ?? config.automators,
    command_mappings: update.command_mappings ?? config.command_mappings,
    web_port: update.web_port ?? config.web_port,
    first_run: update.first_run ?? config.first_run,
  };
}

// ── Snapshot ──

function findDuplicates<T>(items: readonly T[], key: (item: T) => string): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const item of items) {
    const k = key(item);
    if (seen.has(k)) duplicates.add(k);
    seen.add(k);
  }
  return [...duplicates];
}

export function collectWarnings(config: ConfigDocument): string[] {
  const warnings: string[] = [];

  for (const trigger of findDuplicates(config.tcp_commands, (c) => c.trigger.toUpperCase())) {
    warnings.push(`Duplicate trigger '${trigger}': only the first command is used`);
  }
  for (const port of findDuplicates(config.tcp_listeners, (l) => String(l.port))) {
    warnings.push(`Duplicate listener port ${port}`);
  }
  for (const commandId of findDuplicates(config.command_mappings, (m) => m.tcp_command_id)) {
    warnings.push(`Command '${commandId}' has several mappings: only the first is used`);
  }
  for (const automatorId of findDuplicates(config.automators, (a) => a.id)) {
    warnings.push(`Duplicate Automator id '${automatorId}'`);
  }

  return warnings;
}

function freezeAll<T extends object>(items: T[]): readonly Readonly<T>[] {
  return Object.freeze(items.map((item) => Object.freeze({ ...item })));
}

export function buildSnapshot(config: ConfigDocument, version: number): ConfigSnapshot {
  const listeners: TcpListenerConfig[] = config.tcp_listeners;
  const commands: TcpCommandConfig[] = config.tcp_commands;
  const automators: AutomatorConfig[] = config.automators;
  const mappings: CommandMapping[] = config.command_mappings;

  return Object.freeze({
    version,
    listeners: freezeAll(listeners),
    commands: freezeAll(commands),
    automators: freezeAll(automators),
    mappings: freezeAll(mappings),
    warnings: Object.freeze(collectWarnings(config)),
  });
}
