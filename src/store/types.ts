// Backing store contract for the file center.
//
// A store persists file records and their chunks. It owns no policy: the
// repository decides what to insert, consume and reclaim. The only logic a
// store must get right is atomicity of `insertItem` against the content hash
// index and of `consumeTemporary`.

import type { ObjectId } from 'mongodb';

import type { FileRecord } from '../file-center/types.js';

/** Bumped whenever the persisted layout changes incompatibly. */
export const STORE_SCHEMA_VERSION = 1;

/**
 * `duplicate` means another perennial record already holds the same
 * content hash; nothing was written.
 */
export type InsertOutcome = 'inserted' | 'duplicate';

export interface FileStore {
  /** Human-readable backend name for logs and health output */
  readonly name: string;

  /** Create indexes and check the persisted schema version */
  initialize(): Promise<void>;

  /** Id of the perennial record with this content hash, if any */
  findIdByHash(contentHash: string): Promise<ObjectId | null>;

  insertItem(record: FileRecord): Promise<InsertOutcome>;

  findItem(id: ObjectId): Promise<FileRecord | null>;

  /**
   * Atomically mark a temporary record consumed, provided it is not yet
   * consumed and `now` is before its expiry. Returns the record on success,
   * null if it was expired, already consumed, perennial or missing.
   */
  consumeTemporary(id: ObjectId, now: Date): Promise<FileRecord | null>;

  /** Remove the record and return what was removed. Chunks are left alone. */
  deleteItem(id: ObjectId): Promise<FileRecord | null>;

  insertChunk(parentId: ObjectId, index: number, data: Buffer): Promise<void>;

  readChunk(parentId: ObjectId, index: number): Promise<Buffer | null>;

  /** Remove every chunk of a parent, returning how many were removed */
  deleteChunks(parentId: ObjectId): Promise<number>;

  /**
   * Ids of temporary records ready to reclaim: unconsumed ones whose expiry
   * is at or before `now`, and consumed ones whose expiry is at or before
   * `abandonedBefore`. A consumed record may still be streaming to its reader.
   */
  findExpiredTemporaries(now: Date, abandonedBefore: Date): Promise<ObjectId[]>;

  /** Health check -- returns true if the backend is operational */
  healthy(): Promise<boolean>;

  close(): Promise<void>;
}
