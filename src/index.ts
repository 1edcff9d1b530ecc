export { Bridge } from './services/bridge.js';
export type { BridgeOptions, BridgeStatus, ManualTrigger } from './services/bridge.js';
export { AutomatorClient, buildTriggerUrl, normalizeBaseUrl, selectAutomator } from './services/automatorClient.js';
export type { DispatchOutcome, DispatchRequest } from './services/automatorClient.js';
export { CatalogCache, mergeCatalogList, shortcutTitle } from './services/catalogCache.js';
export { CaptureSession } from './services/captureSession.js';
export { resolveTrigger, inferItemType } from './services/commandResolver.js';
export type { Resolution, ResolvedAction, NoMatch } from './services/commandResolver.js';
export { EventLog } from './services/eventLog.js';
export { ListenerManager } from './services/listenerManager.js';
export type { ReconcileReport } from './services/listenerManager.js';
export * from './services/configStore.js';
export { createApp, startApiServer, closeApiServer } from './server.js';
export { ConfigurationError } from './utils/errors.js';
export type * from './types/index.js';
