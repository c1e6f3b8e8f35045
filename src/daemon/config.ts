/**
 * Agent configuration builder.
 *
 * Reads from environment variables with defaults; any value can be
 * overridden programmatically. The result is frozen and passed to every
 * component; nothing reads configuration from global state afterwards.
 */

import * as path from 'node:path';
import { ConfigurationError } from '../errors.js';
import type { AgentConfig } from './types.js';
import { DEFAULT_AGENT_CONFIG, DEFAULT_IGNORED_PATTERNS } from './types.js';

function getEnv(key: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

function getEnvNumber(key: string, fallback: number): number {
  const raw = getEnv(key);
  if (raw === undefined) return fallback;
  const parsed = parseInt(raw, 10);
  return isNaN(parsed) ? fallback : parsed;
}

function getEnvList(key: string): string[] | undefined {
  const raw = getEnv(key);
  if (raw === undefined) return undefined;
  return raw
    .split(',')
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}

function getEnvBoolean(key: string, fallback: boolean): boolean {
  const raw = getEnv(key);
  if (raw === undefined) return fallback;
  return raw === 'true' || raw === '1';
}

/**
 * Build agent config from environment variables and optional overrides.
 *
 * Environment variables:
 * - MEDIA_SYNC_SERVER: server base URL
 * - MEDIA_SYNC_API_KEY: API key
 * - MEDIA_SYNC_PATHS: comma-separated directories to sync
 * - MEDIA_SYNC_DEVICE_ID: fallback owner tag (default: media-sync)
 * - MEDIA_SYNC_INCLUDE_VIDEO: also sync videos (default: false)
 * - MEDIA_SYNC_BACKOFF_MS: comma-separated probe delays (default: 500,5000,60000)
 * - MEDIA_SYNC_WRITE_STABILITY_MS: write settle time (default: 500)
 * - MEDIA_SYNC_REQUEST_TIMEOUT_MS: JSON request timeout (default: 30000)
 * - MEDIA_SYNC_UPLOAD_TIMEOUT_MS: upload timeout (default: 600000)
 * - MEDIA_SYNC_IGNORED: comma-separated additional ignored patterns
 */
export function buildAgentConfig(overrides?: Partial<AgentConfig>): AgentConfig {
  const roots = overrides?.roots ?? getEnvList('MEDIA_SYNC_PATHS') ?? [];
  const envBackoff = getEnvList('MEDIA_SYNC_BACKOFF_MS')?.map((v) => parseInt(v, 10));

  const mergedIgnored = [
    ...DEFAULT_IGNORED_PATTERNS,
    ...(getEnvList('MEDIA_SYNC_IGNORED') ?? []),
    ...(overrides?.ignoredPatterns ?? []),
  ];

  const config: AgentConfig = {
    serverUrl: overrides?.serverUrl ?? getEnv('MEDIA_SYNC_SERVER') ?? '',
    apiKey: overrides?.apiKey ?? getEnv('MEDIA_SYNC_API_KEY') ?? '',
    // Deduplicate after resolving so ./a and a count once
    roots: [...new Set(roots.map((r) => path.resolve(r)))],
    deviceId: overrides?.deviceId ?? getEnv('MEDIA_SYNC_DEVICE_ID') ?? DEFAULT_AGENT_CONFIG.deviceId,
    includeVideo: overrides?.includeVideo ?? getEnvBoolean('MEDIA_SYNC_INCLUDE_VIDEO', DEFAULT_AGENT_CONFIG.includeVideo),
    backoffTiersMs: [...(overrides?.backoffTiersMs ?? envBackoff ?? DEFAULT_AGENT_CONFIG.backoffTiersMs)],
    writeStabilityMs:
      overrides?.writeStabilityMs ?? getEnvNumber('MEDIA_SYNC_WRITE_STABILITY_MS', DEFAULT_AGENT_CONFIG.writeStabilityMs),
    requestTimeoutMs:
      overrides?.requestTimeoutMs ?? getEnvNumber('MEDIA_SYNC_REQUEST_TIMEOUT_MS', DEFAULT_AGENT_CONFIG.requestTimeoutMs),
    uploadTimeoutMs:
      overrides?.uploadTimeoutMs ?? getEnvNumber('MEDIA_SYNC_UPLOAD_TIMEOUT_MS', DEFAULT_AGENT_CONFIG.uploadTimeoutMs),
    pingTimeoutMs: overrides?.pingTimeoutMs ?? DEFAULT_AGENT_CONFIG.pingTimeoutMs,
    maxAttemptsWhileReachable: overrides?.maxAttemptsWhileReachable ?? DEFAULT_AGENT_CONFIG.maxAttemptsWhileReachable,
    disconnectLogIntervalMs: overrides?.disconnectLogIntervalMs ?? DEFAULT_AGENT_CONFIG.disconnectLogIntervalMs,
    ignoredPatterns: [...new Set(mergedIgnored)],
  };

  return Object.freeze(config);
}

/**
 * Validate an agent configuration.
 * Returns an array of error messages (empty = valid).
 */
export function validateAgentConfig(config: AgentConfig): string[] {
  const errors: string[] = [];

  if (!config.serverUrl) {
    errors.push('serverUrl is required: specify the server URL');
  } else if (!/^https?:\/\/[^/]+/i.test(config.serverUrl)) {
    errors.push(`serverUrl must be an http(s) URL, got "${config.serverUrl}"`);
  }

  if (!config.apiKey) {
    errors.push('apiKey is required: specify the server API key');
  }

  if (config.roots.length === 0) {
    errors.push('roots is required: specify at least one directory to sync');
  }

  if (config.backoffTiersMs.length === 0) {
    errors.push('backoffTiersMs must contain at least one delay');
  } else if (config.backoffTiersMs.some((t) => !Number.isFinite(t) || t < 0)) {
    errors.push('backoffTiersMs must only contain non-negative numbers');
  }

  if (config.writeStabilityMs < 0) {
    errors.push('writeStabilityMs must not be negative');
  }

  if (config.requestTimeoutMs < 1) {
    errors.push('requestTimeoutMs must be at least 1');
  }

  if (config.uploadTimeoutMs < 1) {
    errors.push('uploadTimeoutMs must be at least 1');
  }

  if (config.maxAttemptsWhileReachable < 1) {
    errors.push('maxAttemptsWhileReachable must be at least 1');
  }

  return errors;
}

/**
 * @throws ConfigurationError listing every problem
 */
export function assertValidConfig(config: AgentConfig): void {
  const errors = validateAgentConfig(config);
  if (errors.length > 0) {
    throw new ConfigurationError(errors);
  }
}
