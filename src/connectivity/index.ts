export { ConnectivityMonitor } from './connectivity-monitor.js';
export type { TypedConnectivityEmitter } from './connectivity-monitor.js';
export { DEFAULT_BACKOFF_TIERS_MS } from './types.js';
export type {
  ConnectivityMonitorEvents,
  ConnectivityMonitorOptions,
  ConnectivityState,
  SleepFn,
} from './types.js';
