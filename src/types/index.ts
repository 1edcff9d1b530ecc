export interface TcpListenerConfig {
  port: number;
  name: string;
  enabled: boolean;
}

export interface TcpCommandConfig {
  id: string;
  name: string;
  trigger: string;
  description: string;
}

export interface AutomatorConfig {
  id: string;
  name: string;
  url: string;
  api_key: string;
  enabled: boolean;
}

export interface CommandMapping {
  tcp_command_id: string;
  automator_id: string;
  target_item_id: string;
  target_item_name: string;
  item_type?: ItemType;
}

export interface ConfigDocument {
  config_version: string;
  web_port: number;
  first_run: boolean;
  tcp_listeners: TcpListenerConfig[];
  tcp_commands: TcpCommandConfig[];
  automators: AutomatorConfig[];
  command_mappings: CommandMapping[];
}

/**
 * Immutable view of the configuration handed to the listener manager,
 * resolver and dispatcher. Replaced as a whole on every update.
 */
export interface ConfigSnapshot {
  readonly version: number;
  readonly listeners: readonly TcpListenerConfig[];
  readonly commands: readonly TcpCommandConfig[];
  readonly automators: readonly AutomatorConfig[];
  readonly mappings: readonly CommandMapping[];
  readonly warnings: readonly string[];
}

export const ITEM_TYPES = ['macro', 'button', 'shortcut'] as const;

export type KnownItemType = (typeof ITEM_TYPES)[number];

export type ItemType = KnownItemType | 'unknown';

export type CatalogListKey = 'macros' | 'buttons' | 'shortcuts';

export interface CatalogItem {
  id: string;
  title: string;
  type: ItemType;
  [field: string]: unknown;
}

export interface Catalog {
  automator_id: string;
  macros: CatalogItem[];
  buttons: CatalogItem[];
  shortcuts: CatalogItem[];
  last_updated: string | null;
}

export interface CaptureResult {
  trigger: string;
  port: number;
  source: string;
}

export type CaptureState =
  | { status: 'idle' }
  | { status: 'listening' }
  | { status: 'captured'; data: CaptureResult };

export type EventKind =
  | 'system'
  | 'config'
  | 'listener'
  | 'listener-warning'
  | 'listener-error'
  | 'received'
  | 'capture'
  | 'no-command'
  | 'no-mapping'
  | 'mapping-error'
  | 'mapping-found'
  | 'dispatch'
  | 'dispatch-success'
  | 'config-error'
  | 'transport-error'
  | 'http-error'
  | 'catalog';

export interface EventEntry {
  at: string;
  kind: EventKind;
  detail: string;
  line: string;
}

export interface ConnectionStatus {
  connected: boolean;
  last_check: string;
  error: string | null;
  automator_id?: string;
  automator_name?: string;
}

export interface PeerInfo {
  id: number;
  address: string;
  connectedAt: number;
}
