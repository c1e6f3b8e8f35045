/**
 * media-sync-agent - watch local directories and upload new photos and
 * videos to a self-hosted media server.
 */

export * from './client/index.js';
export * from './connectivity/index.js';
export * from './daemon/index.js';
export * from './indexer/index.js';
export * from './metadata/index.js';
export {
  SyncAgentError,
  TransportError,
  FileReadError,
  MetadataExtractionError,
  ServerRejection,
  ConfigurationError,
  toError,
  errorCode,
} from './errors.js';
export type { SyncAgentErrorCode } from './errors.js';
export { createLogger, silentLogger, isLogLevel, LOG_LEVELS } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';
