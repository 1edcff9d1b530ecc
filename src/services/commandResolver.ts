import type {
  CatalogItem,
  CommandMapping,
  ConfigSnapshot,
  ItemType,
  TcpCommandConfig,
} from '../types/index.js';

export type ItemLookup = (automatorId: string, itemId: string) => CatalogItem | undefined;

export interface ResolvedAction {
  matched: true;
  command: TcpCommandConfig;
  mapping: CommandMapping;
  automatorId: string;
  itemId: string;
  itemName: string;
  itemType: ItemType;
  /** True when the type came from the catalog (or the macro default) rather than the mapping. */
  inferred: boolean;
}

export type NoMatchReason = 'no-command' | 'no-mapping' | 'mapping-error';

export interface NoMatch {
  matched: false;
  reason: NoMatchReason;
  trigger: string;
  port: number;
  command?: TcpCommandConfig;
  message: string;
}

export type Resolution = ResolvedAction | NoMatch;

export function findCommand(
  commands: readonly TcpCommandConfig[],
  trigger: string,
): TcpCommandConfig | undefined {
  const wanted = trigger.toUpperCase();
  return commands.find((c) => c.trigger.toUpperCase() === wanted);
}

export function findMapping(
  mappings: readonly CommandMapping[],
  commandId: string,
): CommandMapping | undefined {
  return mappings.find((m) => m.tcp_command_id === commandId);
}

/**
 * Legacy mappings carry no item type. The catalog's record of the item wins;
 * items the catalog does not know are treated as macros.
 */
export function inferItemType(item: CatalogItem | undefined): ItemType {
  if (!item || item.type === 'unknown') return 'macro';
  return item.type;
}

export function resolveTrigger(
  snapshot: ConfigSnapshot,
  trigger: string,
  port: number,
  lookupItem: ItemLookup,
): Resolution {
  const command = findCommand(snapshot.commands, trigger);
  if (!command) {
    return {
      matched: false,
      reason: 'no-command',
      trigger,
      port,
      message: `No definition for command '${trigger}' on port ${port}`,
    };
  }

  const mapping = findMapping(snapshot.mappings, command.id);
  if (!mapping) {
    return {
      matched: false,
      reason: 'no-mapping',
      trigger,
      port,
      command,
      message: `No mapping for '${command.name || command.id}'`,
    };
  }

  if (!mapping.automator_id) {
    return {
      matched: false,
      reason: 'mapping-error',
      trigger,
      port,
      command,
      message: `No Automator specified for '${command.name || command.id}'`,
    };
  }

  const itemType = mapping.item_type ?? inferItemType(lookupItem(mapping.automator_id, mapping.target_item_id));

  return {
    matched: true,
    command,
    mapping,
    automatorId: mapping.automator_id,
    itemId: mapping.target_item_id,
    itemName: mapping.target_item_name || mapping.target_item_id,
    itemType,
    inferred: mapping.item_type === undefined,
  };
}
