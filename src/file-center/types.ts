// File center domain types

import type { Readable } from 'node:stream';

import type { ObjectId } from 'mongodb';

/**
 * Largest accepted file size threshold. Files up to the threshold are kept
 * inside the item record, which must stay under MongoDB's 16 MiB document
 * limit together with the record's other fields.
 */
export const MAX_FILE_SIZE_THRESHOLD = 16_770_000;

/** 256 KiB */
export const DEFAULT_FILE_SIZE_THRESHOLD = 262_144;

/** Upper bound for a single chunk record (GridFS default chunk size). */
export const MAX_CHUNK_SIZE = 261_120;

export const DEFAULT_TEMPORARY_LIFETIME_MS = 60_000;

/**
 * How long after its expiry a consumed temporary file is left alone. Its
 * reader deletes it on completion; the sweep only collects reads that were
 * abandoned part way.
 */
export const ABANDONED_READ_GRACE_MS = 60 * 60 * 1000;

export const DEFAULT_MIME_TYPE = 'application/octet-stream';

/** How a file's bytes are laid out in the store. Decided once, at write time. */
export type StorageShape = 'inline' | 'chunked';

export interface InlinePayload {
  shape: 'inline';
  data: Buffer;
}

export interface ChunkedPayload {
  shape: 'chunked';
  chunkCount: number;
  /** Size of every chunk except possibly the last one */
  chunkSize: number;
}

export type PayloadDescriptor = InlinePayload | ChunkedPayload;

/**
 * A file item as persisted by a backing store.
 *
 * `contentHash` is set only for perennial files; temporary files always
 * carry `expiresAt` and are never deduplicated.
 */
export interface FileRecord {
  id: ObjectId;
  contentHash?: string;
  size: number;
  fileName?: string;
  mimeType?: string;
  temporary: boolean;
  /** Set once a temporary file has been handed out */
  consumed: boolean;
  createdAt: Date;
  expiresAt?: Date;
  payload: PayloadDescriptor;
}

/**
 * Anything the file center can ingest. Path and buffer sources can be read
 * more than once; a stream source is consumed exactly once.
 */
export type FileSource =
  | { kind: 'path'; path: string }
  | { kind: 'buffer'; data: Uint8Array }
  | { kind: 'stream'; stream: AsyncIterable<Uint8Array> };

export interface PutOptions {
  fileName?: string;
  mimeType?: string;
  /** Temporary files skip deduplication and can be retrieved once */
  temporary?: boolean;
}

/**
 * Payload handed back by `get`: inline files come back buffered, chunked files
 * as a lazy stream that fetches one chunk at a time in sequence order.
 */
export type FileData = { kind: 'buffer'; buffer: Buffer } | { kind: 'stream'; stream: Readable };

export interface FileItem {
  id: ObjectId;
  fileName?: string;
  mimeType?: string;
  size: number;
  temporary: boolean;
  createdAt: Date;
  expiresAt?: Date;
  shape: StorageShape;
  data: FileData;
}
