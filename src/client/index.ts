export { RemoteClient, normalizeServerUrl, parseBulkCheckResponse, toRfc3339 } from './remote-client.js';
export {
  DEFAULT_SUPPORTED_TYPES,
  createExtensionFilter,
  createSupportedFilter,
  extensionOf,
  normalizeExtensions,
  toSupportedTypeSet,
} from './media-types.js';
export type {
  AssetServer,
  ChecksumEntry,
  ReconciliationAction,
  ReconciliationDecision,
  RemoteClientOptions,
  SupportedTypeSet,
  UploadMetadata,
} from './types.js';
