// In-process file store.
//
// Keeps records and chunks in Maps. Every method runs its check and its
// write in the same tick of the event loop, which is what makes
// consumeTemporary and the content hash index atomic here. Suitable for
// development and tests; nothing survives a restart.

import { ObjectId } from 'mongodb';

import type { FileRecord } from '../file-center/types.js';

import type { FileStore, InsertOutcome } from './types.js';

export class MemoryFileStore implements FileStore {
  readonly name = 'memory';

  private readonly items = new Map<string, FileRecord>();
  private readonly hashIndex = new Map<string, string>();
  private readonly chunks = new Map<string, Map<number, Buffer>>();

  async initialize(): Promise<void> {
    // Nothing to prepare
  }

  async findIdByHash(contentHash: string): Promise<ObjectId | null> {
    const id = this.hashIndex.get(contentHash);
    return id ? new ObjectId(id) : null;
  }

  async insertItem(record: FileRecord): Promise<InsertOutcome> {
    const key = record.id.toHexString();
    if (this.items.has(key)) {
      throw new Error(`Duplicate file id ${key}`);
    }

    if (record.contentHash !== undefined) {
      if (this.hashIndex.has(record.contentHash)) {
        return 'duplicate';
      }
      this.hashIndex.set(record.contentHash, key);
    }

    this.items.set(key, copyRecord(record));
    return 'inserted';
  }

  async findItem(id: ObjectId): Promise<FileRecord | null> {
    const record = this.items.get(id.toHexString());
    return record ? copyRecord(record) : null;
  }

  async consumeTemporary(id: ObjectId, now: Date): Promise<FileRecord | null> {
    const record = this.items.get(id.toHexString());
    if (!record || !record.temporary || record.consumed) {
      return null;
    }
    if (!record.expiresAt || record.expiresAt.getTime() <= now.getTime()) {
      return null;
    }

    record.consumed = true;
    return copyRecord(record);
  }

  async deleteItem(id: ObjectId): Promise<FileRecord | null> {
    const key = id.toHexString();
    const record = this.items.get(key);
    if (!record) {
      return null;
    }

    this.items.delete(key);
    if (record.contentHash !== undefined && this.hashIndex.get(record.contentHash) === key) {
      this.hashIndex.delete(record.contentHash);
    }
    return record;
  }

  async insertChunk(parentId: ObjectId, index: number, data: Buffer): Promise<void> {
    const key = parentId.toHexString();
    let parentChunks = this.chunks.get(key);
    if (!parentChunks) {
      parentChunks = new Map();
      this.chunks.set(key, parentChunks);
    }
    if (parentChunks.has(index)) {
      throw new Error(`Duplicate chunk ${index} for file ${key}`);
    }
    parentChunks.set(index, Buffer.from(data));
  }

  async readChunk(parentId: ObjectId, index: number): Promise<Buffer | null> {
    const data = this.chunks.get(parentId.toHexString())?.get(index);
    return data ? Buffer.from(data) : null;
  }

  async deleteChunks(parentId: ObjectId): Promise<number> {
    const key = parentId.toHexString();
    const count = this.chunks.get(key)?.size ?? 0;
    this.chunks.delete(key);
    return count;
  }

  async findExpiredTemporaries(now: Date, abandonedBefore: Date): Promise<ObjectId[]> {
    const expired: ObjectId[] = [];
    for (const record of this.items.values()) {
      if (!record.temporary || !record.expiresAt) {
        continue;
      }
      const cutoff = record.consumed ? abandonedBefore : now;
      if (record.expiresAt.getTime() <= cutoff.getTime()) {
        expired.push(record.id);
      }
    }
    return expired;
  }

  async healthy(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.items.clear();
    this.hashIndex.clear();
    this.chunks.clear();
  }

  /** Number of stored records and chunks */
  stats(): { items: number; chunks: number } {
    let chunkCount = 0;
    for (const parentChunks of this.chunks.values()) {
      chunkCount += parentChunks.size;
    }
    return { items: this.items.size, chunks: chunkCount };
  }
}

function copyRecord(record: FileRecord): FileRecord {
  return {
    ...record,
    payload:
      record.payload.shape === 'inline'
        ? { shape: 'inline', data: Buffer.from(record.payload.data) }
        : { ...record.payload },
  };
}
