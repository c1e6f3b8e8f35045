/**
 * Streaming content digests for reconciliation.
 *
 * The server identifies content by the base64 SHA-1 of the file bytes.
 * Files are streamed through the hash so memory stays flat; the cost is a
 * full read of every file.
 */

import * as crypto from 'node:crypto';
import * as fs from 'node:fs';
import { FileReadError } from '../errors.js';

export interface FileHashResult {
  digest: string;
  sizeBytes: number;
}

/**
 * Hash a file by streaming it.
 *
 * @throws FileReadError if the file cannot be opened or read
 */
export async function hashFile(filePath: string): Promise<FileHashResult> {
  return new Promise<FileHashResult>((resolve, reject) => {
    const hash = crypto.createHash('sha1');
    let sizeBytes = 0;

    const stream = fs.createReadStream(filePath);

    stream.on('data', (chunk: string | Buffer) => {
      sizeBytes += chunk.length;
      hash.update(chunk);
    });

    stream.on('end', () => {
      resolve({ digest: hash.digest('base64'), sizeBytes });
    });

    stream.on('error', (err: Error) => {
      reject(new FileReadError(filePath, `Failed to hash file ${filePath}: ${err.message}`, { cause: err }));
    });
  });
}
