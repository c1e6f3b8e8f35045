/**
 * Checksum indexer: walks watch roots and digests every supported file.
 *
 * Directories are handed to `registerDirectory` as they are found so the
 * file watcher observes subdirectories created later. A file or directory
 * that cannot be read is logged and skipped; the walk always continues.
 */

import type { Dirent } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Logger } from 'pino';
import type { ChecksumEntry } from '../client/types.js';
import { FileReadError, errorCode, toError } from '../errors.js';
import { hashFile } from './file-hasher.js';

export interface IndexOptions {
  /** Whether a file path has a supported extension */
  isSupported: (filePath: string) => boolean;
  /** Called once for every directory found, roots included */
  registerDirectory?: (dirPath: string) => void;
  logger: Logger;
}

export interface IndexResult {
  entries: ChecksumEntry[];
  /** Files that matched but could not be hashed */
  skipped: FileReadError[];
  directories: number;
}

export class ChecksumIndexer {
  private readonly options: IndexOptions;
  private readonly logger: Logger;

  constructor(options: IndexOptions) {
    this.options = options;
    this.logger = options.logger.child({ component: 'checksum-indexer' });
  }

  /**
   * Index every root in order. Roots are resolved to absolute paths so
   * each entry's localId is stable.
   */
  async index(roots: readonly string[]): Promise<IndexResult> {
    const result: IndexResult = { entries: [], skipped: [], directories: 0 };

    for (const root of roots) {
      await this.walk(path.resolve(root), result);
    }

    this.logger.info(
      { roots: roots.length, files: result.entries.length, skipped: result.skipped.length },
      'Indexed local files'
    );
    return result;
  }

  private async walk(dirPath: string, result: IndexResult): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dirPath, { withFileTypes: true });
    } catch (err) {
      this.logger.error({ path: dirPath, err: toError(err) }, 'Cannot read directory, skipping');
      return;
    }

    result.directories++;
    this.options.registerDirectory?.(dirPath);

    for (const entry of entries) {
      const entryPath = path.join(dirPath, entry.name);

      if (entry.isDirectory()) {
        await this.walk(entryPath, result);
      } else if (entry.isFile() && this.options.isSupported(entryPath)) {
        await this.digest(entryPath, result);
      }
      // Symlinks and special files are not followed
    }
  }

  private async digest(filePath: string, result: IndexResult): Promise<void> {
    try {
      const hashed = await hashFile(filePath);
      result.entries.push({ checksum: hashed.digest, localId: filePath });
    } catch (err) {
      const error =
        err instanceof FileReadError ? err : new FileReadError(filePath, toError(err).message, { cause: err });
      result.skipped.push(error);
      this.logger.error({ path: filePath, code: errorCode(error), err: error }, 'Cannot hash file, skipping');
    }
  }
}
