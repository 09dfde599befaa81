// File center module barrel export.

export { FileCenter, createFileCenter, type FileCenterOptions } from './file-center.js';
export { FileCenterConfigSchema, DEFAULT_MAX_FILE_SIZE, type FileCenterConfig } from './config.js';
export { ChunkedStore, type WriteResult } from './chunked-store.js';
export { FileRepository, type InsertResult } from './file-repository.js';
export { IdTokenCodec } from './id-token-codec.js';
export { ContentDigest, hashContent, CONTENT_HASH_ALGORITHM } from './content-hasher.js';
export { fromPath, fromBuffer, fromStream } from './file-source.js';
export { readFileData } from './file-data.js';
export * from './errors.js';
export * from './types.js';
export type { FileStore } from '../store/types.js';
