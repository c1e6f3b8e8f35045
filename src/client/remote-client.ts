/**
 * HTTP client for the remote asset server.
 *
 * Stateless wrapper around four endpoints: liveness ping, supported media
 * types, bulk checksum reconciliation and single-asset upload. Every call
 * is exactly one outbound request and nothing is retried here; retry
 * policy belongs to the connectivity monitor and the sync agent.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { Logger } from 'pino';
import { FileReadError, ServerRejection, TransportError, toError } from '../errors.js';
import { DEFAULT_SUPPORTED_TYPES, toSupportedTypeSet } from './media-types.js';
import type {
  AssetServer,
  BulkCheckResultWire,
  ChecksumEntry,
  ReconciliationDecision,
  RemoteClientOptions,
  SupportedTypeSet,
  UploadMetadata,
} from './types.js';

const PONG_BODY = '{"res":"pong"}';

const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
const DEFAULT_UPLOAD_TIMEOUT_MS = 600_000;
const DEFAULT_PING_TIMEOUT_MS = 5_000;

/**
 * Strip trailing slashes and a trailing `/api` segment so that both
 * `http://host:2283` and `http://host:2283/api/` resolve to the same base.
 */
export function normalizeServerUrl(serverUrl: string): string {
  return serverUrl.trim().replace(/\/+$/, '').replace(/\/api$/, '');
}

/** Format a date as RFC 3339 (UTC, millisecond precision) */
export function toRfc3339(date: Date): string {
  return date.toISOString();
}

function isBulkCheckResult(value: unknown): value is BulkCheckResultWire {
  if (typeof value !== 'object' || value === null) return false;
  return 'action' in value && typeof value.action === 'string' && 'id' in value && typeof value.id === 'string';
}

/**
 * Parse a bulk-upload-check response body.
 * A garbled or partial body yields an empty list rather than an error.
 */
export function parseBulkCheckResponse(body: string): ReconciliationDecision[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return [];
  }

  if (typeof parsed !== 'object' || parsed === null || !('results' in parsed)) return [];
  const results = parsed.results;
  if (!Array.isArray(results) || !results.every(isBulkCheckResult)) return [];

  return results.map((r) => ({
    action: r.action === 'accept' ? 'accept' : 'reject',
    remoteAssetId: typeof r.assetId === 'string' ? r.assetId : undefined,
    localId: r.id,
    alreadyTrashedRemotely: r.isTrashed === true,
    reason: typeof r.reason === 'string' ? r.reason : '',
  }));
}

/** `message` or else `error` from a JSON error body */
function errorDetail(data: unknown): unknown {
  if (typeof data !== 'object' || data === null) return undefined;
  if ('message' in data && data.message != null) return data.message;
  return 'error' in data ? data.error : undefined;
}

export class RemoteClient implements AssetServer {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly requestTimeoutMs: number;
  private readonly uploadTimeoutMs: number;
  private readonly pingTimeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(options: RemoteClientOptions, logger: Logger) {
    this.baseUrl = normalizeServerUrl(options.serverUrl);
    this.apiKey = options.apiKey;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.uploadTimeoutMs = options.uploadTimeoutMs ?? DEFAULT_UPLOAD_TIMEOUT_MS;
    this.pingTimeoutMs = options.pingTimeoutMs ?? DEFAULT_PING_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? fetch;
    this.logger = logger.child({ component: 'remote-client' });
  }

  /** Full URL of an API endpoint */
  endpoint(apiPath: string): string {
    return `${this.baseUrl}/api/${apiPath.replace(/^\/+/, '')}`;
  }

  /**
   * Liveness check. True only when the body is exactly `{"res":"pong"}`;
   * every other outcome, including errors and timeouts, is false.
   */
  async ping(): Promise<boolean> {
    try {
      const response = await this.send('GET', 'server/ping', { timeoutMs: this.pingTimeoutMs });
      const body = await response.text();
      const alive = response.ok && body === PONG_BODY;
      this.logger.debug({ status: response.status, alive }, 'Ping');
      return alive;
    } catch (err) {
      this.logger.debug({ err: toError(err) }, 'Ping failed');
      return false;
    }
  }

  /**
   * Fetch the server's supported extensions. Falls back to
   * DEFAULT_SUPPORTED_TYPES on any failure or an empty image list.
   */
  async fetchSupportedTypes(): Promise<SupportedTypeSet> {
    try {
      const response = await this.send('GET', 'server/media-types', {
        timeoutMs: this.requestTimeoutMs,
      });
      await this.assertOk(response);

      const types = toSupportedTypeSet(await response.json());
      if (types.imageExtensions.size === 0) {
        this.logger.warn('Server returned no image types, using built-in defaults');
        return DEFAULT_SUPPORTED_TYPES;
      }

      this.logger.info(
        {
          image: types.imageExtensions.size,
          video: types.videoExtensions.size,
          sidecar: types.sidecarExtensions.size,
        },
        'Fetched supported media types'
      );
      return types;
    } catch (err) {
      this.logger.warn({ err: toError(err) }, 'Could not fetch media types, using built-in defaults');
      return DEFAULT_SUPPORTED_TYPES;
    }
  }

  /**
   * Submit every checksum in one request.
   *
   * @throws TransportError if the request cannot complete
   * @throws ServerRejection on a 4xx response
   */
  async reconcile(entries: ChecksumEntry[]): Promise<ReconciliationDecision[]> {
    const payload = {
      assets: entries.map((e) => ({ checksum: e.checksum, id: e.localId })),
    };

    const response = await this.send('POST', 'assets/bulk-upload-check', {
      timeoutMs: this.requestTimeoutMs,
      json: payload,
    });
    await this.assertOk(response);

    let body: string;
    try {
      body = await response.text();
    } catch (err) {
      throw new TransportError('Failed to read reconciliation response', { cause: err });
    }

    const decisions = parseBulkCheckResponse(body);
    if (decisions.length === 0 && entries.length > 0) {
      this.logger.warn({ submitted: entries.length }, 'Reconciliation response had no usable results');
    }
    return decisions;
  }

  /**
   * Upload one file with its descriptive fields as a multipart request.
   * Returns the raw response body.
   *
   * @throws FileReadError if the file cannot be read
   * @throws TransportError on network failure, timeout or 5xx
   * @throws ServerRejection on a 4xx response
   */
  async upload(filePath: string, metadata: UploadMetadata): Promise<string> {
    // File-backed: the body is streamed from disk while the request is sent
    let content: Blob;
    try {
      const stats = await fs.promises.stat(filePath);
      if (!stats.isFile()) {
        throw new Error('not a regular file');
      }
      content = await fs.openAsBlob(filePath);
    } catch (err) {
      throw new FileReadError(filePath, `Failed to read ${filePath}: ${toError(err).message}`, {
        cause: err,
      });
    }
    // Some Node 20 releases resolve with the read error instead of rejecting
    if (!(content instanceof Blob)) {
      throw new FileReadError(filePath, `Failed to read ${filePath}`);
    }

    const form = new FormData();
    form.append('assetData', content, path.basename(filePath));
    form.append('deviceAssetId', metadata.deviceAssetId);
    form.append('deviceId', metadata.deviceOwnerTag);
    form.append('fileCreatedAt', toRfc3339(metadata.contentCreatedAt));
    form.append('fileModifiedAt', toRfc3339(metadata.contentModifiedAt));

    const response = await this.send('POST', 'assets', {
      timeoutMs: this.uploadTimeoutMs,
      body: form,
    });
    await this.assertOk(response);

    try {
      const body = await response.text();
      this.logger.info({ path: filePath, size: content.size, status: response.status }, 'Uploaded');
      return body;
    } catch (err) {
      throw new TransportError(`Upload response for ${filePath} was cut off`, { cause: err });
    }
  }

  // ─── Private helpers ──────────────────────────────────────────────

  private async send(
    method: 'GET' | 'POST',
    apiPath: string,
    options: { timeoutMs: number; json?: unknown; body?: FormData }
  ): Promise<Response> {
    const headers: Record<string, string> = {
      'Accept': 'application/json',
      'x-api-key': this.apiKey,
    };

    const init: RequestInit = {
      method,
      headers,
      signal: AbortSignal.timeout(options.timeoutMs),
    };

    if (options.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      init.body = JSON.stringify(options.json);
    } else if (options.body) {
      // fetch sets the multipart boundary itself
      init.body = options.body;
    }

    const url = this.endpoint(apiPath);
    try {
      return await this.fetchImpl(url, init);
    } catch (err) {
      const error = toError(err);
      const reason = error.name === 'TimeoutError' ? `timed out after ${options.timeoutMs}ms` : error.message;
      throw new TransportError(`${method} ${url} failed: ${reason}`, { cause: err });
    }
  }

  /** Map a non-2xx response onto TransportError (5xx) or ServerRejection (4xx) */
  private async assertOk(response: Response): Promise<void> {
    if (response.ok) return;

    let message = `HTTP ${response.status}`;
    try {
      const data: unknown = JSON.parse(await response.text());
      const detail = errorDetail(data);
      if (typeof detail === 'string' && detail) {
        message = detail;
      } else if (Array.isArray(detail) && detail.length > 0) {
        message = detail.map(String).join(', ');
      }
    } catch {
      // Body was not JSON; keep the status line
    }

    if (response.status >= 500) {
      throw new TransportError(message, { status: response.status });
    }
    throw new ServerRejection(response.status, message);
  }
}
