/** Reachability of the remote server */
export type ConnectivityState = 'connected' | 'disconnected';

/** Default backoff tiers: one tier per consecutive failure, holding at the last */
export const DEFAULT_BACKOFF_TIERS_MS: readonly number[] = [500, 5_000, 60_000];

/** Abortable delay; resolves after `ms` or rejects when `signal` aborts */
export type SleepFn = (ms: number, signal: AbortSignal) => Promise<void>;

export interface ConnectivityMonitorOptions {
  /** Liveness check; true when the server answered correctly */
  ping: () => Promise<boolean>;
  /** Backoff delays in ms (default: 500, 5000, 60000) */
  backoffTiersMs?: readonly number[];
  /** Minimum spacing of repeated "still disconnected" log entries (default: 60000) */
  logIntervalMs?: number;
  /** Reported alongside backoff log entries */
  pendingCount?: () => number;
  sleep?: SleepFn;
  now?: () => number;
}

/** Events emitted by the ConnectivityMonitor */
export interface ConnectivityMonitorEvents {
  stateChange: (newState: ConnectivityState, oldState: ConnectivityState) => void;
  /** A probe failed and the next one waits `delayMs` */
  probeFailed: (tier: number, delayMs: number) => void;
}
