/**
 * ConnectivityMonitor - tracks reachability of the remote server.
 *
 * Two states, `connected` and `disconnected`, driven only by ping outcomes.
 * While disconnected a single probe loop pings on an escalating schedule
 * (one backoff tier per consecutive failure, holding at the last tier with
 * no retry cap). The first successful probe flips the state back to
 * `connected`, fires the recovery callback exactly once and ends the loop.
 */

import { EventEmitter } from 'node:events';
import { setTimeout as delay } from 'node:timers/promises';
import type { Logger } from 'pino';
import { toError } from '../errors.js';
import type {
  ConnectivityMonitorEvents,
  ConnectivityMonitorOptions,
  ConnectivityState,
  SleepFn,
} from './types.js';
import { DEFAULT_BACKOFF_TIERS_MS } from './types.js';

const DEFAULT_LOG_INTERVAL_MS = 60_000;

/** Timer-backed abortable sleep */
export const defaultSleep: SleepFn = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export interface TypedConnectivityEmitter {
  on<K extends keyof ConnectivityMonitorEvents>(event: K, listener: ConnectivityMonitorEvents[K]): this;
  off<K extends keyof ConnectivityMonitorEvents>(event: K, listener: ConnectivityMonitorEvents[K]): this;
  emit<K extends keyof ConnectivityMonitorEvents>(
    event: K,
    ...args: Parameters<ConnectivityMonitorEvents[K]>
  ): boolean;
}

export class ConnectivityMonitor extends EventEmitter implements TypedConnectivityEmitter {
  private _state: ConnectivityState = 'connected';
  private readonly ping: () => Promise<boolean>;
  private readonly tiers: readonly number[];
  private readonly logIntervalMs: number;
  private readonly pendingCount: () => number;
  private readonly sleep: SleepFn;
  private readonly now: () => number;
  private readonly logger: Logger;
  private readonly stopController = new AbortController();
  private probe: Promise<void> | null = null;

  // Rate limiting of "still disconnected" entries
  private lastLoggedTier = -1;
  private lastLogAt = 0;

  constructor(options: ConnectivityMonitorOptions, logger: Logger) {
    super();
    const tiers = options.backoffTiersMs ?? DEFAULT_BACKOFF_TIERS_MS;
    if (tiers.length === 0 || tiers.some((t) => !Number.isFinite(t) || t < 0)) {
      throw new Error('backoffTiersMs must be a non-empty list of non-negative delays');
    }

    this.ping = options.ping;
    this.tiers = [...tiers];
    this.logIntervalMs = options.logIntervalMs ?? DEFAULT_LOG_INTERVAL_MS;
    this.pendingCount = options.pendingCount ?? ((): number => 0);
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.logger = logger.child({ component: 'connectivity' });
  }

  get state(): ConnectivityState {
    return this._state;
  }

  /** Whether a recovery probe loop is running */
  get isProbing(): boolean {
    return this.probe !== null;
  }

  /** Aborted once `stop()` is called */
  get stopSignal(): AbortSignal {
    return this.stopController.signal;
  }

  /**
   * One explicit ping. A failure moves the monitor to `disconnected`;
   * a success does not by itself end a disconnection episode.
   */
  async check(): Promise<boolean> {
    const reachable = await this.safePing();
    if (!reachable) {
      this.setState('disconnected');
    }
    return reachable;
  }

  /**
   * Block until the server answers, pinging immediately and then on the
   * backoff schedule. Used before startup work begins.
   *
   * @returns false only if the monitor was stopped while waiting
   */
  async waitForConnectivity(): Promise<boolean> {
    if (await this.safePing()) {
      this.setState('connected');
      return true;
    }

    this.setState('disconnected');
    this.logger.error('Server unreachable, retrying with backoff');
    return this.probeUntilReachable();
  }

  /**
   * Start the background probe loop for a new disconnection episode.
   * `onRecovered` runs once, after the state is back to `connected`.
   *
   * @returns false when a loop is already active (or the monitor stopped)
   */
  startRecoveryProbe(onRecovered: () => void): boolean {
    if (this.probe || this.stopController.signal.aborted) {
      return false;
    }

    this.setState('disconnected');
    this.probe = this.runRecoveryProbe(onRecovered);
    return true;
  }

  /**
   * Schedule a retry while the server still answers pings: wait the first
   * tier, ping, and call `onDue` once it answers. The state stays
   * `connected` unless a ping fails, which turns the wait into a normal
   * recovery episode.
   *
   * @returns false when a loop is already active (or the monitor stopped)
   */
  startRetryProbe(onDue: () => void): boolean {
    if (this.probe || this.stopController.signal.aborted) {
      return false;
    }

    this.probe = this.runRecoveryProbe(onDue);
    return true;
  }

  /** Resolves when the active probe loop (if any) has finished */
  async whenProbeSettled(): Promise<void> {
    if (this.probe) {
      await this.probe;
    }
  }

  /** Abort any backoff wait and end the probe loop */
  async stop(): Promise<void> {
    this.stopController.abort();
    await this.whenProbeSettled();
  }

  // ─── Private helpers ──────────────────────────────────────────────

  private async runRecoveryProbe(onRecovered: () => void): Promise<void> {
    let recovered = false;
    try {
      recovered = await this.probeUntilReachable();
    } catch (err) {
      // The episode ends; the next failed upload or buffered file starts a new one
      this.logger.error({ err: toError(err), state: this._state }, 'Recovery probe failed');
    } finally {
      this.probe = null;
    }
    if (recovered) {
      onRecovered();
    }
  }

  private async probeUntilReachable(): Promise<boolean> {
    const signal = this.stopController.signal;
    let tier = 0;
    this.lastLoggedTier = -1;

    while (!signal.aborted) {
      const delayMs = this.tierDelay(tier);
      try {
        await this.sleep(delayMs, signal);
      } catch (err) {
        if (signal.aborted) return false;
        throw err;
      }

      if (await this.safePing()) {
        if (this._state === 'disconnected') {
          this.setState('connected');
          this.logger.info({ pendingUploads: this.pendingCount() }, 'Connectivity re-established');
        }
        return true;
      }

      this.setState('disconnected');
      tier = Math.min(tier + 1, this.tiers.length - 1);
      this.reportFailure(tier);
    }
    return false;
  }

  private tierDelay(tier: number): number {
    return this.tiers[Math.min(tier, this.tiers.length - 1)] ?? 0;
  }

  private reportFailure(tier: number): void {
    const delayMs = this.tierDelay(tier);
    this.emit('probeFailed', tier, delayMs);

    const now = this.now();
    if (tier !== this.lastLoggedTier || now - this.lastLogAt >= this.logIntervalMs) {
      this.lastLoggedTier = tier;
      this.lastLogAt = now;
      this.logger.info(
        { tier, delayMs, pendingUploads: this.pendingCount() },
        'Server still unreachable, backing off'
      );
    }
  }

  private async safePing(): Promise<boolean> {
    try {
      return await this.ping();
    } catch (err) {
      this.logger.debug({ err: toError(err) }, 'Ping threw');
      return false;
    }
  }

  private setState(newState: ConnectivityState): void {
    const oldState = this._state;
    if (oldState === newState) return;
    this._state = newState;
    this.logger.info({ from: oldState, to: newState }, 'Connectivity state changed');
    this.emit('stateChange', newState, oldState);
  }
}
