/**
 * Types for the remote asset-server client.
 */

/** Content digest of one local file, submitted for reconciliation */
export interface ChecksumEntry {
  /** Base64 SHA-1 of the file bytes */
  checksum: string;
  /** Absolute local path; echoed back by the server as `id` */
  localId: string;
}

export type ReconciliationAction = 'accept' | 'reject';

/** Server verdict for one submitted ChecksumEntry */
export interface ReconciliationDecision {
  action: ReconciliationAction;
  /** Remote asset id when the server already holds the content */
  remoteAssetId: string | undefined;
  localId: string;
  alreadyTrashedRemotely: boolean;
  /** Why the server rejected the entry (e.g. duplicate), empty on accept */
  reason: string;
}

/** Extensions the server accepts, lowercase and dot-prefixed */
export interface SupportedTypeSet {
  readonly imageExtensions: ReadonlySet<string>;
  readonly videoExtensions: ReadonlySet<string>;
  readonly sidecarExtensions: ReadonlySet<string>;
}

/** Descriptive form fields sent alongside an uploaded file */
export interface UploadMetadata {
  /** Stable per-device id of the asset (file name without extension) */
  deviceAssetId: string;
  /** Camera make + model, or the configured device id */
  deviceOwnerTag: string;
  contentCreatedAt: Date;
  contentModifiedAt: Date;
}

/**
 * The four remote operations the agent depends on.
 * `RemoteClient` is the HTTP implementation; tests substitute fakes.
 */
export interface AssetServer {
  ping(): Promise<boolean>;
  fetchSupportedTypes(): Promise<SupportedTypeSet>;
  reconcile(entries: ChecksumEntry[]): Promise<ReconciliationDecision[]>;
  upload(filePath: string, metadata: UploadMetadata): Promise<string>;
}

/** Options for the HTTP client */
export interface RemoteClientOptions {
  /** Server base URL, with or without a trailing /api */
  serverUrl: string;
  apiKey: string;
  /** Timeout for JSON requests (ms, default: 30000) */
  requestTimeoutMs?: number;
  /** Timeout for a single upload (ms, default: 600000) */
  uploadTimeoutMs?: number;
  /** Timeout for the liveness ping (ms, default: 5000) */
  pingTimeoutMs?: number;
  /** fetch implementation (default: global fetch) */
  fetch?: typeof fetch;
}

/** Wire shape of one entry in the bulk-upload-check response */
export interface BulkCheckResultWire {
  action: string;
  assetId?: string;
  id: string;
  isTrashed?: boolean;
  reason?: string;
}
