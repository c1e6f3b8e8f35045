/**
 * SyncAgent - watches local roots and uploads new media to the server.
 *
 * Lifecycle: idle -> starting -> running -> stopping -> stopped
 *
 * The agent:
 * 1. Blocks until the server answers a ping (backoff, no retry cap)
 * 2. Fetches the supported media types (built-in defaults on failure)
 * 3. Starts the file watcher, then reconciles existing files before any
 *    live event is handled
 * 4. Uploads each new supported file immediately while connected, or
 *    buffers it while disconnected
 * 5. On recovery, uploads the buffer in order
 *
 * Every unit of work runs on one serial dispatcher, so uploads never
 * overlap and events are handled in the order the watcher reported them.
 * Connectivity state and the buffer are only touched from dispatcher jobs
 * and the single probe loop they start.
 */

import { EventEmitter } from 'node:events';
import * as fs from 'node:fs';
import * as path from 'node:path';
import type { Logger } from 'pino';
import type { AssetServer } from '../client/types.js';
import { createSupportedFilter } from '../client/media-types.js';
import { ConnectivityMonitor, defaultSleep } from '../connectivity/connectivity-monitor.js';
import type { ConnectivityState, SleepFn } from '../connectivity/types.js';
import { TransportError, errorCode, toError } from '../errors.js';
import type { MetadataResolver } from '../metadata/metadata-extractor.js';
import { assertValidConfig } from './config.js';
import { SerialDispatcher } from './dispatcher.js';
import { drainAndUploadAll } from './drain.js';
import { FileWatcher, type FileWatcherCallbacks, type FileWatcherOptions } from './file-watcher.js';
import { runReconciliation } from './reconciliation.js';
import type {
  AgentConfig,
  AgentState,
  DispatchJob,
  ServiceLifecycle,
  SyncAgentEvents,
  SyncAgentStats,
} from './types.js';
import { UploadBuffer } from './upload-buffer.js';
import { UploadLedger } from './upload-ledger.js';

/** The part of FileWatcher the agent drives */
export interface RootWatcher {
  start(): Promise<void>;
  add(dirPath: string): void;
  remove(dirPath: string): void;
  stop(): Promise<void>;
}

export type WatcherFactory = (options: FileWatcherOptions, callbacks: FileWatcherCallbacks) => RootWatcher;

export interface SyncAgentDependencies {
  client: AssetServer;
  metadataOf: MetadataResolver;
  logger: Logger;
  /** Backoff sleep for the connectivity monitor (default: timers) */
  sleep?: SleepFn;
  /** Watcher construction (default: chokidar FileWatcher) */
  createWatcher?: WatcherFactory;
}

/**
 * Typed event emitter interface for the agent.
 */
export interface TypedSyncAgentEmitter {
  on<K extends keyof SyncAgentEvents>(event: K, listener: SyncAgentEvents[K]): this;
  off<K extends keyof SyncAgentEvents>(event: K, listener: SyncAgentEvents[K]): this;
  emit<K extends keyof SyncAgentEvents>(event: K, ...args: Parameters<SyncAgentEvents[K]>): boolean;
}

const defaultWatcherFactory: WatcherFactory = (options, callbacks) => new FileWatcher(options, callbacks);

/** Ledger entries outlive the write-stability wait by this factor */
const LEDGER_RETENTION_FACTOR = 4;
const MIN_LEDGER_RETENTION_MS = 2_000;

export class SyncAgent extends EventEmitter implements ServiceLifecycle, TypedSyncAgentEmitter {
  private _state: AgentState = 'idle';
  private readonly config: AgentConfig;
  private readonly client: AssetServer;
  private readonly metadataOf: MetadataResolver;
  private readonly logger: Logger;
  private readonly sleep: SleepFn | undefined;
  private readonly createWatcher: WatcherFactory;
  private readonly buffer = new UploadBuffer();
  private readonly ledger: UploadLedger;

  private monitor: ConnectivityMonitor;
  private dispatcher: SerialDispatcher<DispatchJob>;
  private watcher: RootWatcher | null = null;
  private roots: string[];
  private isSupported: (filePath: string) => boolean = () => false;
  /** A recovered/retry job is posted and not yet handled */
  private drainQueued = false;
  /** Roots whose reconciliation must re-run after the next recovery */
  private readonly pendingReconciliation: Set<string> = new Set();

  // Stats
  private _startedAt: number | null = null;
  private _filesUploaded = 0;
  private _uploadFailures = 0;
  private _filesDiscarded = 0;
  private _recoveries = 0;
  private _lastUploadAt: number | null = null;

  constructor(config: AgentConfig, deps: SyncAgentDependencies) {
    super();
    this.config = config;
    this.client = deps.client;
    this.metadataOf = deps.metadataOf;
    this.logger = deps.logger.child({ component: 'sync-agent' });
    this.sleep = deps.sleep;
    this.createWatcher = deps.createWatcher ?? defaultWatcherFactory;
    this.roots = [...config.roots];
    this.ledger = new UploadLedger({
      retentionMs: Math.max(config.writeStabilityMs * LEDGER_RETENTION_FACTOR, MIN_LEDGER_RETENTION_MS),
    });
    this.monitor = this.createMonitor();
    this.dispatcher = this.createDispatcher();
  }

  /** Current agent state */
  get state(): AgentState {
    return this._state;
  }

  /** Current connectivity state */
  get connectivity(): ConnectivityState {
    return this.monitor.state;
  }

  /** Buffered paths in upload order */
  get pendingUploads(): string[] {
    return this.buffer.snapshot();
  }

  /** Roots currently being synced */
  get watchedRoots(): string[] {
    return [...this.roots];
  }

  /**
   * Start the agent.
   *
   * Validates configuration, waits for the server, loads the supported
   * types, starts the watcher and queues the reconciliation pass.
   *
   * @throws ConfigurationError when server URL, key or roots are missing
   */
  async start(): Promise<void> {
    if (this._state !== 'idle' && this._state !== 'stopped') {
      throw new Error(`Cannot start agent from state: ${this._state}`);
    }

    if (this._state === 'stopped') {
      this.monitor = this.createMonitor();
      this.dispatcher = this.createDispatcher();
      this.drainQueued = false;
    }

    this.setState('starting');

    try {
      assertValidConfig(this.config);
    } catch (err) {
      this.setState('stopped');
      throw err;
    }

    for (const root of this.roots) {
      if (!fs.existsSync(root)) {
        this.logger.warn({ root }, 'Sync root does not exist yet');
      }
    }

    this.logger.info({ server: this.config.serverUrl, roots: this.roots }, 'Waiting for server');
    const reachable = await this.monitor.waitForConnectivity();
    if (!reachable || this.state !== 'starting') {
      // stop() was called while waiting
      return;
    }

    const types = await this.client.fetchSupportedTypes();
    if (this.state !== 'starting') return;
    this.isSupported = createSupportedFilter(types, { includeVideo: this.config.includeVideo });

    let watcher: RootWatcher;
    try {
      watcher = this.createWatcher(
        {
          roots: this.roots,
          ignoredPatterns: this.config.ignoredPatterns,
          writeStabilityMs: this.config.writeStabilityMs,
        },
        {
          onEvent: (event): void => {
            this.notifyFileCreated(event.absolutePath);
          },
          onError: (error: Error): void => {
            this.dispatcher.post({ kind: 'watchError', error });
          },
          onReady: (): void => {
            this.logger.debug('Watcher ready');
          },
        }
      );
      this.watcher = watcher;
      await watcher.start();
    } catch (err) {
      if (this.state !== 'starting') {
        this.logger.warn({ err: toError(err) }, 'Watcher failed to start while stopping');
        return;
      }
      await this.monitor.stop();
      this.setState('stopped');
      throw err;
    }

    if (this.state !== 'starting') {
      // stop() ran during watcher.start(); it may have missed this watcher
      await watcher.stop();
      if (this.watcher === watcher) this.watcher = null;
      return;
    }

    // Queued first: live events wait behind the reconciliation pass
    this.dispatcher.post({ kind: 'reconcile', roots: [...this.roots] });

    this._startedAt = Date.now();
    this.setState('running');
  }

  /**
   * Stop the agent.
   *
   * Ends the probe loop and the watcher, lets the in-flight upload finish,
   * then drops queued work. Buffered paths are not persisted.
   */
  async stop(): Promise<void> {
    if (this._state === 'stopped' || this._state === 'idle' || this._state === 'stopping') {
      return;
    }

    this.setState('stopping');

    await this.monitor.stop();

    if (this.watcher) {
      await this.watcher.stop();
      this.watcher = null;
    }

    const droppedJobs = await this.dispatcher.close();

    if (this.buffer.size > 0 || droppedJobs > 0) {
      this.logger.warn(
        { buffered: this.buffer.size, paths: this.buffer.snapshot(), droppedJobs },
        'Stopping with unsent files; they will be checked again on next start'
      );
    }
    this.buffer.clear();

    this.setState('stopped');
    this.emit('stopped');
  }

  /**
   * Report a newly created file. Called by the watcher; also usable by
   * hosts with their own change notifications.
   */
  notifyFileCreated(filePath: string): void {
    this.dispatcher.post({ kind: 'fileCreated', path: path.resolve(filePath) });
  }

  /**
   * Replace the set of synced roots. Added roots are reconciled and
   * watched, removed roots are unwatched.
   */
  updateRoots(roots: readonly string[]): void {
    if (this._state !== 'running') {
      this.logger.warn({ state: this._state }, 'Ignoring root update while not running');
      return;
    }
    this.dispatcher.post({ kind: 'rootsChanged', roots: [...roots] });
  }

  /**
   * Resolves once no job is queued or running and no probe loop is active.
   */
  async settle(): Promise<void> {
    while (this.dispatcher.isBusy || this.monitor.isProbing) {
      await this.dispatcher.whenIdle();
      await this.monitor.whenProbeSettled();
    }
  }

  /**
   * Get current agent statistics.
   */
  getStats(): SyncAgentStats {
    return {
      state: this._state,
      connectivity: this.monitor.state,
      startedAt: this._startedAt,
      filesUploaded: this._filesUploaded,
      uploadFailures: this._uploadFailures,
      filesDiscarded: this._filesDiscarded,
      pendingUploads: this.buffer.size,
      recoveries: this._recoveries,
      lastUploadAt: this._lastUploadAt,
    };
  }

  // ─── Dispatcher jobs ──────────────────────────────────────────────

  private async handleJob(job: DispatchJob): Promise<void> {
    switch (job.kind) {
      case 'reconcile':
        await this.reconcileRoots(job.roots);
        return;
      case 'fileCreated':
        await this.handleFileCreated(job.path);
        return;
      case 'recovered':
        this._recoveries++;
        await this.drainBuffer();
        return;
      case 'retry':
        await this.drainBuffer();
        return;
      case 'rootsChanged':
        await this.applyRoots(job.roots);
        return;
      case 'watchError':
        this.reportError(job.error, 'Watcher error');
        return;
    }
  }

  private async handleFileCreated(filePath: string): Promise<void> {
    if (!this.isSupported(filePath)) {
      this.logger.trace({ path: filePath }, 'Ignoring unsupported file');
      return;
    }

    if (await this.ledger.isUploaded(filePath)) {
      this.logger.debug({ path: filePath }, 'Already uploaded this version, skipping');
      return;
    }

    this.logger.info({ path: filePath }, 'New file');
    await this.uploadOrBuffer(filePath);
  }

  private async reconcileRoots(roots: readonly string[]): Promise<void> {
    // Uploads made by the walk stay in the ledger until the watcher has caught up
    this.ledger.hold();
    try {
      await runReconciliation(roots, {
        client: this.client,
        isSupported: this.isSupported,
        registerDirectory: (dirPath: string): void => {
          this.watcher?.add(dirPath);
        },
        onAccepted: (filePath: string) => this.uploadOrBuffer(filePath),
        logger: this.logger,
      });
    } catch (err) {
      if (err instanceof TransportError && !(await this.monitor.check())) {
        this.logger.warn({ roots }, 'Server lost during reconciliation, will retry after reconnecting');
        for (const root of roots) {
          this.pendingReconciliation.add(root);
        }
        this.beginDisconnection();
        return;
      }
      this.reportError(toError(err), 'Reconciliation failed');
    } finally {
      this.ledger.release();
    }
  }

  private async drainBuffer(): Promise<void> {
    this.drainQueued = false;

    if (this.buffer.size > 0) {
      const outcome = await drainAndUploadAll(this.buffer, {
        upload: (filePath: string) => this.uploadFile(filePath),
        checkReachable: () => this.monitor.check(),
        maxAttemptsWhileReachable: this.config.maxAttemptsWhileReachable,
        backoffTiersMs: this.config.backoffTiersMs,
        sleep: this.sleep ?? defaultSleep,
        signal: this.monitor.stopSignal,
        logger: this.logger,
        onDiscarded: (filePath: string, error: Error): void => {
          this._filesDiscarded++;
          this._uploadFailures++;
          this.emit('uploadFailed', filePath, error);
        },
      });
      this.emit('drained', outcome.uploaded.length, outcome.remaining);

      if (outcome.status === 'disconnected') {
        this.beginDisconnection();
        return;
      }
      if (outcome.status === 'stopped') return;
    }

    if (this.pendingReconciliation.size > 0) {
      const roots = [...this.pendingReconciliation].filter((r) => this.roots.includes(r));
      this.pendingReconciliation.clear();
      if (roots.length > 0) {
        await this.reconcileRoots(roots);
      }
    }
  }

  private async applyRoots(requested: readonly string[]): Promise<void> {
    const next = [...new Set(requested.map((r) => path.resolve(r)))];
    const removed = this.roots.filter((r) => !next.includes(r));
    const added = next.filter((r) => !this.roots.includes(r));

    for (const root of removed) {
      this.watcher?.remove(root);
      this.pendingReconciliation.delete(root);
    }
    this.roots = next;
    for (const root of added) {
      this.watcher?.add(root);
    }

    this.logger.info({ added, removed }, 'Sync roots updated');

    if (added.length === 0) return;
    if (this.monitor.state === 'disconnected') {
      for (const root of added) {
        this.pendingReconciliation.add(root);
      }
      return;
    }
    await this.reconcileRoots(added);
  }

  // ─── Upload path ──────────────────────────────────────────────────

  /**
   * Upload now when connected, otherwise buffer. A failed upload re-probes
   * the server; if it is gone the file is buffered and a probe loop starts.
   * A TransportError while the server still answers buffers the file too,
   * and the buffer is retried after the first backoff tier.
   */
  private async uploadOrBuffer(filePath: string): Promise<void> {
    // Files already waiting go first
    if (this.monitor.state === 'disconnected' || this.buffer.size > 0) {
      this.bufferPath(filePath);
      this.ensureDrainScheduled();
      return;
    }

    try {
      await this.uploadFile(filePath);
    } catch (err) {
      const error = toError(err);
      this._uploadFailures++;
      this.emit('uploadFailed', filePath, error);

      if (!(await this.monitor.check())) {
        this.logger.info({ path: filePath }, 'Connectivity lost, storing to buffer and retrying');
        this.bufferPath(filePath);
        this.beginDisconnection();
        return;
      }

      if (err instanceof TransportError) {
        this.logger.warn(
          { path: filePath, code: errorCode(err), status: err.status },
          'Upload failed while the server answers, storing to buffer and retrying'
        );
        this.bufferPath(filePath);
        this.scheduleRetry();
        return;
      }

      this.logger.error({ path: filePath, code: errorCode(err), err: error }, 'Upload failed');
    }
  }

  private async uploadFile(filePath: string): Promise<void> {
    const metadata = await this.metadataOf(filePath);
    await this.client.upload(filePath, metadata);
    await this.ledger.record(filePath);

    this._filesUploaded++;
    this._lastUploadAt = Date.now();
    this.emit('uploaded', filePath);
  }

  private bufferPath(filePath: string): void {
    if (!this.buffer.enqueue(filePath)) {
      this.logger.debug({ path: filePath }, 'Already buffered');
      return;
    }
    this.logger.info({ path: filePath, pending: this.buffer.size }, 'Buffered for upload after reconnect');
    this.emit('buffered', filePath, this.buffer.size);
  }

  private beginDisconnection(): void {
    const started = this.monitor.startRecoveryProbe((): void => {
      this.drainQueued = true;
      this.dispatcher.post({ kind: 'recovered' });
    });
    if (started) {
      this.logger.warn({ pending: this.buffer.size }, 'Server unreachable, probing for recovery');
    }
  }

  private scheduleRetry(): void {
    this.monitor.startRetryProbe((): void => {
      this.drainQueued = true;
      this.dispatcher.post({ kind: 'retry' });
    });
  }

  /** Make sure buffered files have a probe or a queued drain behind them */
  private ensureDrainScheduled(): void {
    if (this.drainQueued || this.monitor.isProbing) return;
    if (this.monitor.state === 'disconnected') {
      this.beginDisconnection();
    } else {
      this.scheduleRetry();
    }
  }

  // ─── Private helpers ──────────────────────────────────────────────

  private createMonitor(): ConnectivityMonitor {
    return new ConnectivityMonitor(
      {
        ping: () => this.client.ping(),
        backoffTiersMs: this.config.backoffTiersMs,
        logIntervalMs: this.config.disconnectLogIntervalMs,
        pendingCount: () => this.buffer.size,
        sleep: this.sleep,
      },
      this.logger
    );
  }

  private createDispatcher(): SerialDispatcher<DispatchJob> {
    return new SerialDispatcher<DispatchJob>(
      (job) => this.handleJob(job),
      (error, job) => {
        this.reportError(error, `Failed to handle ${job.kind}`);
      }
    );
  }

  private reportError(error: Error, message: string): void {
    this.logger.error({ err: error, code: errorCode(error) }, message);
    // EventEmitter throws on an unhandled 'error' event
    if (this.listenerCount('error') > 0) {
      this.emit('error', error);
    }
  }

  private setState(newState: AgentState): void {
    const oldState = this._state;
    this._state = newState;
    this.emit('stateChange', newState, oldState);
  }
}
