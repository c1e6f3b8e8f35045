/**
 * File watcher wrapping chokidar for the sync roots.
 *
 * Reports newly created files only. A file is reported once it has stopped
 * growing for `writeStabilityMs`, so half-copied photos are not uploaded.
 * Directories are watched recursively; `add()` is idempotent.
 */

import * as path from 'node:path';
import { watch, type FSWatcher } from 'chokidar';
import type { FileEvent } from './types.js';

export interface FileWatcherOptions {
  roots: readonly string[];
  ignoredPatterns: readonly string[];
  /** 0 disables write-finish detection */
  writeStabilityMs: number;
}

export interface FileWatcherCallbacks {
  onEvent: (event: FileEvent) => void;
  onError: (error: Error) => void;
  onReady: () => void;
}

export class FileWatcher {
  private watcher: FSWatcher | null = null;
  private readonly options: FileWatcherOptions;
  private readonly callbacks: FileWatcherCallbacks;
  private readonly watched: Set<string> = new Set();
  private _isWatching = false;
  /** Settles a start() still waiting for the initial scan */
  private settleStart: (() => void) | null = null;

  constructor(options: FileWatcherOptions, callbacks: FileWatcherCallbacks) {
    this.options = options;
    this.callbacks = callbacks;
  }

  /** Whether the watcher is currently active */
  get isWatching(): boolean {
    return this._isWatching;
  }

  /** Paths registered with the watcher, roots and added directories */
  get watchedPaths(): string[] {
    return [...this.watched];
  }

  /**
   * Start watching the roots.
   * Resolves when chokidar has finished the initial scan, or when stop()
   * is called first; existing files are not reported.
   */
  async start(): Promise<void> {
    if (this._isWatching || this.settleStart) {
      return;
    }

    const roots = this.options.roots.map((r) => path.resolve(r));
    for (const root of roots) {
      this.watched.add(root);
    }

    return new Promise<void>((resolve, reject) => {
      this.settleStart = resolve;
      try {
        this.watcher = watch(roots, {
          ignored: [...this.options.ignoredPatterns],
          persistent: true,
          ignoreInitial: true,
          awaitWriteFinish:
            this.options.writeStabilityMs > 0
              ? { stabilityThreshold: this.options.writeStabilityMs, pollInterval: 100 }
              : false,
          followSymlinks: false,
        });

        this.watcher.on('ready', () => {
          if (!this.settleStart) return;
          this.settleStart = null;
          this._isWatching = true;
          this.callbacks.onReady();
          resolve();
        });

        this.watcher.on('error', (error: unknown) => {
          this.callbacks.onError(error instanceof Error ? error : new Error(String(error)));
        });

        this.watcher.on('add', (filePath: string) => {
          this.callbacks.onEvent({
            type: 'add',
            absolutePath: path.resolve(filePath),
            timestamp: Date.now(),
          });
        });
      } catch (err) {
        this.settleStart = null;
        reject(err instanceof Error ? err : new Error(String(err)));
      }
    });
  }

  /**
   * Register a directory. Paths already covered by a watched ancestor are
   * only recorded.
   */
  add(dirPath: string): void {
    const resolved = path.resolve(dirPath);
    if (this.watched.has(resolved)) return;

    const covered = this.isCovered(resolved);
    this.watched.add(resolved);
    if (!covered) {
      this.watcher?.add(resolved);
    }
  }

  /** Stop watching a root and everything registered beneath it */
  remove(dirPath: string): void {
    const resolved = path.resolve(dirPath);
    for (const watchedPath of [...this.watched]) {
      if (watchedPath === resolved || watchedPath.startsWith(resolved + path.sep)) {
        this.watched.delete(watchedPath);
      }
    }
    this.watcher?.unwatch(resolved);
  }

  /**
   * Stop watching and clean up resources.
   */
  async stop(): Promise<void> {
    const settleStart = this.settleStart;
    this.settleStart = null;
    settleStart?.();

    if (this.watcher) {
      await this.watcher.close();
      this.watcher = null;
    }
    this.watched.clear();
    this._isWatching = false;
  }

  private isCovered(resolved: string): boolean {
    for (const watchedPath of this.watched) {
      if (resolved.startsWith(watchedPath + path.sep)) {
        return true;
      }
    }
    return false;
  }
}
