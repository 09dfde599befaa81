// File record repository: policy over a FileStore.
//
// Decides when a temporary record may be handed out, performs dedup
// arbitration after a lost insert race, and reclaims expired or consumed
// temporaries. Store failures surface as StoreUnavailableError.

import type { FastifyBaseLogger } from 'fastify';
import type { ObjectId } from 'mongodb';

import type { FileStore } from '../store/types.js';

import { isFileCenterError, StoreUnavailableError } from './errors.js';
import { ABANDONED_READ_GRACE_MS, type FileRecord } from './types.js';

/** Attempts at inserting a perennial record whose hash keeps colliding */
const MAX_INSERT_ATTEMPTS = 2;

export interface InsertResult {
  id: ObjectId;
  /** False when an existing perennial record with the same hash won */
  created: boolean;
}

export class FileRepository {
  private readonly store: FileStore;
  private readonly logger: FastifyBaseLogger;

  constructor(options: { store: FileStore; logger: FastifyBaseLogger }) {
    this.store = options.store;
    this.logger = options.logger;
  }

  get storeName(): string {
    return this.store.name;
  }

  async initialize(): Promise<void> {
    await this.guard('initialize', () => this.store.initialize());
  }

  async findByHash(contentHash: string): Promise<ObjectId | null> {
    return this.guard('findByHash', () => this.store.findIdByHash(contentHash));
  }

  /**
   * Persist a record whose payload has already been written.
   *
   * A perennial insert that loses to a concurrent insert of the same content
   * resolves to the winner's id; the caller then owns cleanup of its payload.
   */
  async insert(record: FileRecord): Promise<InsertResult> {
    for (let attempt = 1; attempt <= MAX_INSERT_ATTEMPTS; attempt++) {
      const outcome = await this.guard('insert', () => this.store.insertItem(record));
      if (outcome === 'inserted') {
        return { id: record.id, created: true };
      }

      const contentHash = record.contentHash;
      if (contentHash === undefined) {
        break;
      }
      const winner = await this.findByHash(contentHash);
      if (winner) {
        this.logger.debug(
          { fileId: winner.toHexString(), contentHash },
          'Concurrent insert of identical content resolved to existing file'
        );
        return { id: winner, created: false };
      }
      // The winner was deleted between our insert and the lookup
    }

    throw new StoreUnavailableError('insert');
  }

  /**
   * Load a record for retrieval.
   *
   * Perennial records are returned as stored. A temporary record is returned
   * only if this call is the one that atomically consumes it; expired,
   * unconsumed records observed here are reclaimed in the background. Unknown,
   * consumed and expired all come back as null.
   */
  async load(id: ObjectId, now: Date = new Date()): Promise<FileRecord | null> {
    const record = await this.guard('load', () => this.store.findItem(id));
    if (!record) {
      return null;
    }
    if (!record.temporary) {
      return record;
    }

    const consumed = await this.guard('consume', () => this.store.consumeTemporary(id, now));
    if (consumed) {
      this.logger.debug({ fileId: id.toHexString() }, 'Temporary file consumed');
      return consumed;
    }

    // A consumed record belongs to the reader that consumed it
    if (!record.consumed && record.expiresAt && record.expiresAt.getTime() <= now.getTime()) {
      this.reclaimInBackground(id);
    }
    return null;
  }

  /**
   * Remove a record and, for chunked files, every chunk it owns. The record
   * goes first so no reader can start on a half-deleted payload.
   *
   * @returns false if there was no such record
   */
  async delete(id: ObjectId): Promise<boolean> {
    const removed = await this.guard('delete', () => this.store.deleteItem(id));
    if (!removed) {
      return false;
    }
    if (removed.payload.shape === 'chunked') {
      await this.deleteChunks(id);
    }
    return true;
  }

  /**
   * Delete every unconsumed temporary record whose lifetime has ended, and
   * consumed ones whose reader has had `ABANDONED_READ_GRACE_MS` past expiry
   * to finish.
   */
  async reclaimExpired(now: Date = new Date()): Promise<number> {
    const abandonedBefore = new Date(now.getTime() - ABANDONED_READ_GRACE_MS);
    const expired = await this.guard('reclaimExpired', () =>
      this.store.findExpiredTemporaries(now, abandonedBefore)
    );

    let reclaimed = 0;
    for (const id of expired) {
      if (await this.delete(id)) {
        reclaimed++;
      }
    }
    if (reclaimed > 0) {
      this.logger.debug({ reclaimed }, 'Expired temporary files reclaimed');
    }
    return reclaimed;
  }

  /** Fire-and-forget delete; failures are logged */
  reclaimInBackground(id: ObjectId): void {
    void this.delete(id)
      .then((deleted) => {
        if (deleted) {
          this.logger.debug({ fileId: id.toHexString() }, 'Temporary file reclaimed');
        }
      })
      .catch((error: unknown) => {
        this.logger.warn(
          { err: error instanceof Error ? error.message : error, fileId: id.toHexString() },
          'Temporary file reclamation failed'
        );
      });
  }

  async insertChunk(parentId: ObjectId, index: number, data: Buffer): Promise<void> {
    await this.guard('insertChunk', () => this.store.insertChunk(parentId, index, data));
  }

  async readChunk(parentId: ObjectId, index: number): Promise<Buffer | null> {
    return this.guard('readChunk', () => this.store.readChunk(parentId, index));
  }

  async deleteChunks(parentId: ObjectId): Promise<number> {
    return this.guard('deleteChunks', () => this.store.deleteChunks(parentId));
  }

  async healthy(): Promise<boolean> {
    return this.store.healthy();
  }

  async close(): Promise<void> {
    await this.guard('close', () => this.store.close());
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (isFileCenterError(error)) {
        throw error;
      }
      this.logger.error(
        { err: error instanceof Error ? error.message : error, operation, store: this.store.name },
        'File store operation failed'
      );
      throw new StoreUnavailableError(operation);
    }
  }
}
