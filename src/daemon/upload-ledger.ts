/**
 * Upload ledger - remembers which file versions this process just uploaded.
 *
 * A file created while the startup walk is running can be reported both by
 * the walk and by the watcher. The ledger keys each successful upload by
 * path and records its size and mtime, so the second report of the same
 * version is recognized and skipped.
 *
 * Entries only matter for that overlap. Uploads recorded while a
 * reconciliation pass holds the ledger are kept until the pass ends, then
 * expire `retentionMs` later; any other upload expires `retentionMs` after
 * it was recorded.
 */

import * as fs from 'node:fs/promises';

export interface UploadLedgerOptions {
  retentionMs: number;
  now?: () => number;
}

interface LedgerEntry {
  sizeBytes: number;
  mtimeMs: number;
  /** Infinity while held by a reconciliation pass */
  expiresAt: number;
}

export class UploadLedger {
  private readonly entries: Map<string, LedgerEntry> = new Map();
  private readonly retentionMs: number;
  private readonly now: () => number;
  private holds = 0;

  constructor(options: UploadLedgerOptions) {
    this.retentionMs = options.retentionMs;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  /** Keep entries recorded from now on until the matching `release()` */
  hold(): void {
    this.holds++;
  }

  /** Start the retention window of every held entry */
  release(): void {
    if (this.holds === 0) return;
    this.holds--;
    if (this.holds > 0) return;

    const expiresAt = this.now() + this.retentionMs;
    for (const entry of this.entries.values()) {
      if (entry.expiresAt === Infinity) {
        entry.expiresAt = expiresAt;
      }
    }
  }

  /** Record a successful upload of the file as it is on disk now */
  async record(filePath: string): Promise<void> {
    this.prune();
    try {
      const stats = await fs.stat(filePath);
      this.entries.set(filePath, {
        sizeBytes: stats.size,
        mtimeMs: stats.mtimeMs,
        expiresAt: this.holds > 0 ? Infinity : this.now() + this.retentionMs,
      });
    } catch {
      // Gone since the upload; nothing to match against later
      this.entries.delete(filePath);
    }
  }

  /** True when the file on disk is the version already uploaded */
  async isUploaded(filePath: string): Promise<boolean> {
    this.prune();
    const entry = this.entries.get(filePath);
    if (!entry) return false;

    try {
      const stats = await fs.stat(filePath);
      return stats.size === entry.sizeBytes && stats.mtimeMs === entry.mtimeMs;
    } catch {
      return false;
    }
  }

  /** Drop expired entries */
  prune(): void {
    const now = this.now();
    for (const [filePath, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(filePath);
      }
    }
  }
}
