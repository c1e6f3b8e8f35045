/**
 * Error taxonomy for the sync agent.
 *
 * Every failure a component reports is one of these classes, so callers
 * can branch on `code` (or `instanceof`) instead of parsing messages.
 */

export type SyncAgentErrorCode =
  | 'TRANSPORT'
  | 'FILE_READ'
  | 'METADATA_EXTRACTION'
  | 'SERVER_REJECTION'
  | 'CONFIGURATION';

export abstract class SyncAgentError extends Error {
  abstract readonly code: SyncAgentErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network failure, timeout, or a 5xx response */
export class TransportError extends SyncAgentError {
  readonly code = 'TRANSPORT';
  public readonly status: number | undefined;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.status = options?.status;
  }
}

/** A local file could not be opened, stat'ed or read */
export class FileReadError extends SyncAgentError {
  readonly code = 'FILE_READ';
  public readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.path = path;
  }
}

/** Embedded capture metadata is present but could not be parsed */
export class MetadataExtractionError extends SyncAgentError {
  readonly code = 'METADATA_EXTRACTION';
  public readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.path = path;
  }
}

/** Well-formed server response refusing the request (4xx) */
export class ServerRejection extends SyncAgentError {
  readonly code = 'SERVER_REJECTION';
  public readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.status = status;
  }
}

/** Missing or invalid server URL, API key or watch roots */
export class ConfigurationError extends SyncAgentError {
  readonly code = 'CONFIGURATION';
  public readonly problems: readonly string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.problems = problems;
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export function errorCode(value: unknown): string {
  return value instanceof SyncAgentError ? value.code : 'UNKNOWN';
}
