export { SyncAgent } from './sync-agent.js';
export type {
  RootWatcher,
  SyncAgentDependencies,
  TypedSyncAgentEmitter,
  WatcherFactory,
} from './sync-agent.js';
export { buildAgentConfig, validateAgentConfig, assertValidConfig } from './config.js';
export { FileWatcher } from './file-watcher.js';
export type { FileWatcherCallbacks, FileWatcherOptions } from './file-watcher.js';
export { UploadBuffer } from './upload-buffer.js';
export { UploadLedger } from './upload-ledger.js';
export type { UploadLedgerOptions } from './upload-ledger.js';
export { SerialDispatcher } from './dispatcher.js';
export type { JobHandler } from './dispatcher.js';
export { drainAndUploadAll } from './drain.js';
export type { DrainDependencies, DrainOutcome, DrainStatus } from './drain.js';
export { runReconciliation } from './reconciliation.js';
export type { ReconciliationOptions, ReconciliationSummary } from './reconciliation.js';
export { DEFAULT_AGENT_CONFIG, DEFAULT_IGNORED_PATTERNS } from './types.js';
export type {
  AgentConfig,
  AgentState,
  DispatchJob,
  FileEvent,
  ServiceLifecycle,
  SyncAgentEvents,
  SyncAgentStats,
} from './types.js';
