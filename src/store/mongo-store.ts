// MongoDB file store.
//
// Collections:
//   file_center          one document per file; inline bytes live in `file_data`
//   file_center_chunks   `{ parent_id, n, data }` for chunked files
//   file_center_settings persisted schema version
//
// The unique partial index on `content_hash` is the dedup index; the
// conditional findOneAndUpdate in consumeTemporary is the single-use gate.

import {
  MongoServerError,
  type Collection,
  type Db,
  type MongoClient,
  type ObjectId,
  type WithId,
} from 'mongodb';

import { InconsistentPayloadError, StoreVersionError } from '../file-center/errors.js';
import type { FileRecord, StorageShape } from '../file-center/types.js';

import { STORE_SCHEMA_VERSION, type FileStore, type InsertOutcome } from './types.js';

export const COLLECTION_FILES_NAME = 'file_center';
export const COLLECTION_CHUNKS_NAME = 'file_center_chunks';
export const COLLECTION_SETTINGS_NAME = 'file_center_settings';

const SETTING_VERSION = 'version';
const DUPLICATE_KEY_ERROR = 11000;

export interface FileItemDocument {
  _id: ObjectId;
  content_hash?: string;
  file_size: number;
  file_name?: string;
  mime_type?: string;
  temporary: boolean;
  consumed: boolean;
  create_time: Date;
  expire_at?: Date;
  storage_shape: StorageShape;
  file_data?: Buffer;
  chunk_count?: number;
  chunk_size?: number;
}

export interface ChunkDocument {
  _id?: ObjectId;
  parent_id: ObjectId;
  n: number;
  data: Buffer;
}

export interface SettingDocument {
  _id: string;
  value: number;
}

export class MongoFileStore implements FileStore {
  readonly name = 'mongodb';

  private readonly client: MongoClient;
  private readonly db: Db;
  private readonly files: Collection<FileItemDocument>;
  private readonly chunks: Collection<ChunkDocument>;
  private readonly settings: Collection<SettingDocument>;

  constructor(options: { client: MongoClient; database: string }) {
    this.client = options.client;
    this.db = options.client.db(options.database);
    this.files = this.db.collection<FileItemDocument>(COLLECTION_FILES_NAME, {
      promoteBuffers: true,
    });
    this.chunks = this.db.collection<ChunkDocument>(COLLECTION_CHUNKS_NAME, {
      promoteBuffers: true,
    });
    this.settings = this.db.collection<SettingDocument>(COLLECTION_SETTINGS_NAME);
  }

  async initialize(): Promise<void> {
    await this.client.connect();

    const stored = await this.settings.findOne({ _id: SETTING_VERSION });
    if (stored && stored.value > STORE_SCHEMA_VERSION) {
      throw new StoreVersionError(stored.value, STORE_SCHEMA_VERSION);
    }
    if (!stored) {
      await this.settings.updateOne(
        { _id: SETTING_VERSION },
        { $setOnInsert: { value: STORE_SCHEMA_VERSION } },
        { upsert: true }
      );
    }

    await this.files.createIndex(
      { content_hash: 1 },
      { unique: true, partialFilterExpression: { content_hash: { $exists: true } } }
    );
    await this.files.createIndex({ expire_at: 1 });
    await this.chunks.createIndex({ parent_id: 1, n: 1 }, { unique: true });
  }

  async findIdByHash(contentHash: string): Promise<ObjectId | null> {
    const doc = await this.files.findOne(
      { content_hash: contentHash },
      { projection: { _id: 1 } }
    );
    return doc?._id ?? null;
  }

  async insertItem(record: FileRecord): Promise<InsertOutcome> {
    try {
      await this.files.insertOne(toDocument(record));
      return 'inserted';
    } catch (error) {
      if (
        error instanceof MongoServerError &&
        error.code === DUPLICATE_KEY_ERROR &&
        record.contentHash !== undefined
      ) {
        return 'duplicate';
      }
      throw error;
    }
  }

  async findItem(id: ObjectId): Promise<FileRecord | null> {
    const doc = await this.files.findOne({ _id: id });
    return doc ? fromDocument(doc) : null;
  }

  async consumeTemporary(id: ObjectId, now: Date): Promise<FileRecord | null> {
    const doc = await this.files.findOneAndUpdate(
      { _id: id, temporary: true, consumed: false, expire_at: { $gt: now } },
      { $set: { consumed: true } },
      { returnDocument: 'after' }
    );
    return doc ? fromDocument(doc) : null;
  }

  async deleteItem(id: ObjectId): Promise<FileRecord | null> {
    const doc = await this.files.findOneAndDelete({ _id: id });
    return doc ? fromDocument(doc) : null;
  }

  async insertChunk(parentId: ObjectId, index: number, data: Buffer): Promise<void> {
    await this.chunks.insertOne({ parent_id: parentId, n: index, data });
  }

  async readChunk(parentId: ObjectId, index: number): Promise<Buffer | null> {
    const doc = await this.chunks.findOne({ parent_id: parentId, n: index });
    return doc?.data ?? null;
  }

  async deleteChunks(parentId: ObjectId): Promise<number> {
    const result = await this.chunks.deleteMany({ parent_id: parentId });
    return result.deletedCount;
  }

  async findExpiredTemporaries(now: Date, abandonedBefore: Date): Promise<ObjectId[]> {
    const docs = await this.files
      .find(
        {
          temporary: true,
          $or: [
            { consumed: false, expire_at: { $lte: now } },
            { consumed: true, expire_at: { $lte: abandonedBefore } },
          ],
        },
        { projection: { _id: 1 } }
      )
      .toArray();
    return docs.map((doc) => doc._id);
  }

  async healthy(): Promise<boolean> {
    try {
      await this.db.command({ ping: 1 });
      return true;
    } catch {
      return false;
    }
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}

export function toDocument(record: FileRecord): FileItemDocument {
  const { payload } = record;
  return {
    _id: record.id,
    ...(record.contentHash !== undefined && { content_hash: record.contentHash }),
    file_size: record.size,
    ...(record.fileName !== undefined && { file_name: record.fileName }),
    ...(record.mimeType !== undefined && { mime_type: record.mimeType }),
    temporary: record.temporary,
    consumed: record.consumed,
    create_time: record.createdAt,
    ...(record.expiresAt !== undefined && { expire_at: record.expiresAt }),
    storage_shape: payload.shape,
    ...(payload.shape === 'inline'
      ? { file_data: payload.data }
      : { chunk_count: payload.chunkCount, chunk_size: payload.chunkSize }),
  };
}

export function fromDocument(doc: WithId<FileItemDocument>): FileRecord {
  let payload: FileRecord['payload'];
  if (doc.storage_shape === 'inline') {
    if (!doc.file_data) {
      throw new InconsistentPayloadError(`file ${doc._id.toHexString()} has no inline data`);
    }
    payload = { shape: 'inline', data: doc.file_data };
  } else {
    if (doc.chunk_count === undefined || doc.chunk_size === undefined) {
      throw new InconsistentPayloadError(`file ${doc._id.toHexString()} has no chunk layout`);
    }
    payload = { shape: 'chunked', chunkCount: doc.chunk_count, chunkSize: doc.chunk_size };
  }

  return {
    id: doc._id,
    ...(doc.content_hash !== undefined && { contentHash: doc.content_hash }),
    size: doc.file_size,
    ...(doc.file_name !== undefined && { fileName: doc.file_name }),
    ...(doc.mime_type !== undefined && { mimeType: doc.mime_type }),
    temporary: doc.temporary,
    consumed: doc.consumed,
    createdAt: doc.create_time,
    ...(doc.expire_at !== undefined && { expiresAt: doc.expire_at }),
    payload,
  };
}
