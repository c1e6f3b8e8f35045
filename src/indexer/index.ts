export { ChecksumIndexer } from './checksum-indexer.js';
export type { IndexOptions, IndexResult } from './checksum-indexer.js';
export { hashFile } from './file-hasher.js';
export type { FileHashResult } from './file-hasher.js';
