/**
 * Shared fakes for agent tests: an in-process asset server, a recording
 * sleep, a fixed metadata resolver and a watcher driven by hand.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { Logger } from 'pino';
import { DEFAULT_SUPPORTED_TYPES } from '../client/media-types.js';
import type {
  AssetServer,
  ChecksumEntry,
  ReconciliationDecision,
  SupportedTypeSet,
  UploadMetadata,
} from '../client/types.js';
import type { SleepFn } from '../connectivity/types.js';
import type { FileWatcherCallbacks, FileWatcherOptions } from '../daemon/file-watcher.js';
import type { RootWatcher, WatcherFactory } from '../daemon/sync-agent.js';
import { silentLogger } from '../logger.js';
import type { MetadataResolver } from '../metadata/metadata-extractor.js';

export function testLogger(): Logger {
  return silentLogger();
}

export function acceptDecision(entry: ChecksumEntry): ReconciliationDecision {
  return {
    action: 'accept',
    remoteAssetId: undefined,
    localId: entry.localId,
    alreadyTrashedRemotely: false,
    reason: '',
  };
}

export function rejectDecision(entry: ChecksumEntry): ReconciliationDecision {
  return {
    action: 'reject',
    remoteAssetId: 'asset-existing',
    localId: entry.localId,
    alreadyTrashedRemotely: false,
    reason: 'duplicate',
  };
}

/** Scripted AssetServer; queued results are consumed in call order */
export class FakeAssetServer implements AssetServer {
  /** Results of successive pings; `pingDefault` once exhausted */
  pingResults: boolean[] = [];
  pingDefault = true;
  pings = 0;

  types: SupportedTypeSet = DEFAULT_SUPPORTED_TYPES;
  /** When set, `fetchSupportedTypes()` waits on it */
  typesGate: Promise<void> | undefined;

  decide: (entry: ChecksumEntry) => ReconciliationDecision = acceptDecision;
  reconcileErrors: Error[] = [];
  reconcileCalls: ChecksumEntry[][] = [];

  /** Errors thrown by successive uploads; success once exhausted */
  uploadErrors: Error[] = [];
  uploadAttempts = 0;
  uploads: Array<{ path: string; metadata: UploadMetadata }> = [];

  async ping(): Promise<boolean> {
    this.pings++;
    return this.pingResults.shift() ?? this.pingDefault;
  }

  async fetchSupportedTypes(): Promise<SupportedTypeSet> {
    if (this.typesGate) await this.typesGate;
    return this.types;
  }

  async reconcile(entries: ChecksumEntry[]): Promise<ReconciliationDecision[]> {
    this.reconcileCalls.push([...entries]);
    const error = this.reconcileErrors.shift();
    if (error) throw error;
    return entries.map((e) => this.decide(e));
  }

  async upload(filePath: string, metadata: UploadMetadata): Promise<string> {
    this.uploadAttempts++;
    const error = this.uploadErrors.shift();
    if (error) throw error;
    this.uploads.push({ path: filePath, metadata });
    return JSON.stringify({ id: `asset-${this.uploads.length}`, status: 'created' });
  }

  get uploadedPaths(): string[] {
    return this.uploads.map((u) => u.path);
  }
}

/** Sleep that resolves at once and records each requested delay */
export function recordingSleep(): { sleep: SleepFn; delays: number[] } {
  const delays: number[] = [];
  const sleep: SleepFn = async (ms: number) => {
    delays.push(ms);
  };
  return { sleep, delays };
}

/** Sleep that only ends when aborted */
export function blockingSleep(): { sleep: SleepFn; delays: number[] } {
  const delays: number[] = [];
  const sleep: SleepFn = (ms: number, signal: AbortSignal) => {
    delays.push(ms);
    return new Promise<void>((_resolve, reject) => {
      signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
    });
  };
  return { sleep, delays };
}

export function fixedMetadata(): MetadataResolver {
  return async (filePath: string): Promise<UploadMetadata> => ({
    deviceAssetId: path.basename(filePath, path.extname(filePath)),
    deviceOwnerTag: 'test-device',
    contentCreatedAt: new Date('2024-05-01T10:00:00.000Z'),
    contentModifiedAt: new Date('2024-05-01T10:00:00.000Z'),
  });
}

/** Watcher that records calls and emits events on request */
export class FakeWatcher implements RootWatcher {
  readonly options: FileWatcherOptions;
  readonly callbacks: FileWatcherCallbacks;
  readonly added: string[] = [];
  readonly removed: string[] = [];
  started = false;
  stopped = false;
  /** When set, `start()` waits on it before reporting ready */
  private readonly startGate: Promise<void> | undefined;

  constructor(options: FileWatcherOptions, callbacks: FileWatcherCallbacks, startGate?: Promise<void>) {
    this.options = options;
    this.callbacks = callbacks;
    this.startGate = startGate;
  }

  async start(): Promise<void> {
    this.started = true;
    if (this.startGate) await this.startGate;
    this.callbacks.onReady();
  }

  add(dirPath: string): void {
    this.added.push(dirPath);
  }

  remove(dirPath: string): void {
    this.removed.push(dirPath);
  }

  async stop(): Promise<void> {
    this.stopped = true;
  }

  emitAdd(filePath: string): void {
    this.callbacks.onEvent({ type: 'add', absolutePath: filePath, timestamp: Date.now() });
  }
}

export function fakeWatcherFactory(startGate?: Promise<void>): { factory: WatcherFactory; watchers: FakeWatcher[] } {
  const watchers: FakeWatcher[] = [];
  const factory: WatcherFactory = (options, callbacks) => {
    const watcher = new FakeWatcher(options, callbacks, startGate);
    watchers.push(watcher);
    return watcher;
  };
  return { factory, watchers };
}

/** A promise and the function that resolves it */
export function gate(): { promise: Promise<void>; open: () => void } {
  let open: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { promise, open };
}

export function writeFile(dir: string, name: string, content: string | Buffer): string {
  const filePath = path.join(dir, name);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content);
  return filePath;
}
