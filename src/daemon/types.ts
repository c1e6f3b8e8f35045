/**
 * Types for the sync agent.
 *
 * The agent watches local roots for new media files and uploads them to
 * the remote asset server, buffering uploads while the server is
 * unreachable.
 */

import type { ConnectivityState } from '../connectivity/types.js';

/** Agent lifecycle states */
export type AgentState = 'idle' | 'starting' | 'running' | 'stopping' | 'stopped';

/** Immutable configuration handed to every component at construction */
export interface AgentConfig {
  /** Server base URL */
  readonly serverUrl: string;
  /** API key sent as x-api-key */
  readonly apiKey: string;
  /** Absolute paths of the directories to sync */
  readonly roots: readonly string[];
  /** Owner tag used when a file carries no camera make/model */
  readonly deviceId: string;
  /** Also sync video files (default: false, images only) */
  readonly includeVideo: boolean;
  /** Recovery probe delays in ms */
  readonly backoffTiersMs: readonly number[];
  /** How long a new file must stop growing before it is reported (ms) */
  readonly writeStabilityMs: number;
  /** Timeout for JSON requests (ms) */
  readonly requestTimeoutMs: number;
  /** Timeout for one upload (ms) */
  readonly uploadTimeoutMs: number;
  /** Timeout for a liveness ping (ms) */
  readonly pingTimeoutMs: number;
  /** Upload attempts per buffered file while the server stays reachable */
  readonly maxAttemptsWhileReachable: number;
  /** Minimum spacing of repeated "still disconnected" log entries (ms) */
  readonly disconnectLogIntervalMs: number;
  /** Glob patterns the watcher ignores */
  readonly ignoredPatterns: readonly string[];
}

/** Files the watcher never reports: OS litter and partial downloads */
export const DEFAULT_IGNORED_PATTERNS: readonly string[] = [
  '**/.git/**',
  '**/.DS_Store',
  '**/Thumbs.db',
  '**/desktop.ini',
  '**/.trash*/**',
  '**/*.tmp',
  '**/*.part',
  '**/*.crdownload',
  '**/*.swp',
  '**/*~',
] as const;

/** Default configuration values */
export const DEFAULT_AGENT_CONFIG: Omit<AgentConfig, 'serverUrl' | 'apiKey' | 'roots'> = {
  deviceId: 'media-sync',
  includeVideo: false,
  backoffTiersMs: [500, 5_000, 60_000],
  writeStabilityMs: 500,
  requestTimeoutMs: 30_000,
  uploadTimeoutMs: 600_000,
  pingTimeoutMs: 5_000,
  maxAttemptsWhileReachable: 3,
  disconnectLogIntervalMs: 60_000,
  ignoredPatterns: [...DEFAULT_IGNORED_PATTERNS],
};

/** A new file reported by the watcher */
export interface FileEvent {
  type: 'add';
  absolutePath: string;
  timestamp: number;
}

/** Work items processed one at a time by the agent's dispatcher */
export type DispatchJob =
  | { kind: 'reconcile'; roots: readonly string[] }
  | { kind: 'fileCreated'; path: string }
  | { kind: 'recovered' }
  | { kind: 'retry' }
  | { kind: 'rootsChanged'; roots: readonly string[] }
  | { kind: 'watchError'; error: Error };

/** Host-controlled lifecycle hooks */
export interface ServiceLifecycle {
  start(): Promise<void>;
  stop(): Promise<void>;
}

/** Counters exposed by the agent */
export interface SyncAgentStats {
  state: AgentState;
  connectivity: ConnectivityState;
  startedAt: number | null;
  filesUploaded: number;
  uploadFailures: number;
  /** Paths discarded after repeated failures while the server was reachable */
  filesDiscarded: number;
  pendingUploads: number;
  recoveries: number;
  lastUploadAt: number | null;
}

/** Events emitted by the SyncAgent */
export interface SyncAgentEvents {
  stateChange: (newState: AgentState, oldState: AgentState) => void;
  uploaded: (filePath: string) => void;
  uploadFailed: (filePath: string, error: Error) => void;
  buffered: (filePath: string, pending: number) => void;
  drained: (uploaded: number, remaining: number) => void;
  error: (error: Error) => void;
  stopped: () => void;
}
