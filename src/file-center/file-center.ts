// FileCenter facade: put/get/delete over a FileStore plus id tokens.

import type { FastifyBaseLogger } from 'fastify';
import { ObjectId } from 'mongodb';

import type { FileStore } from '../store/types.js';

import { ChunkedStore, type WriteResult } from './chunked-store.js';
import { DEFAULT_MAX_FILE_SIZE, type FileCenterConfig } from './config.js';
import { ContentDigest, hashContent } from './content-hasher.js';
import { FileSizeThresholdError, InconsistentPayloadError } from './errors.js';
import { FileRepository, type InsertResult } from './file-repository.js';
import { openSource } from './file-source.js';
import { IdTokenCodec } from './id-token-codec.js';
import {
  DEFAULT_FILE_SIZE_THRESHOLD,
  DEFAULT_TEMPORARY_LIFETIME_MS,
  MAX_FILE_SIZE_THRESHOLD,
  type FileItem,
  type FileRecord,
  type FileSource,
  type PutOptions,
} from './types.js';

export interface FileCenterOptions {
  store: FileStore;
  codecKey: string;
  logger: FastifyBaseLogger;
  /** Bytes; files up to this size are stored inline (default 256 KiB) */
  fileSizeThreshold?: number;
  /** Milliseconds a temporary file stays retrievable (default 60s) */
  temporaryLifetimeMs?: number;
  maxFileSize?: number;
}

interface RecordMetadata {
  contentHash?: string;
  fileName?: string;
  mimeType?: string;
  temporary: boolean;
}

/**
 * Entry point for storing and retrieving files.
 *
 * Apart from its configuration the instance holds one piece of mutable
 * state: `sweeping`, which keeps at most one background sweep of expired
 * temporaries running per instance. It only de-duplicates sweeps inside this
 * process; correctness never depends on it, since every reclaim goes through
 * the store's atomic operations.
 */
export class FileCenter {
  readonly temporaryLifetimeMs: number;
  private readonly repository: FileRepository;
  private readonly chunks: ChunkedStore;
  private readonly codec: IdTokenCodec;
  private readonly logger: FastifyBaseLogger;
  /** True while a background sweep started by `put` is running */
  private sweeping = false;

  constructor(options: FileCenterOptions) {
    const threshold = options.fileSizeThreshold ?? DEFAULT_FILE_SIZE_THRESHOLD;
    if (!Number.isInteger(threshold) || threshold < 1 || threshold > MAX_FILE_SIZE_THRESHOLD) {
      throw new FileSizeThresholdError(threshold);
    }

    this.logger = options.logger;
    this.temporaryLifetimeMs = options.temporaryLifetimeMs ?? DEFAULT_TEMPORARY_LIFETIME_MS;
    this.codec = new IdTokenCodec(options.codecKey);
    this.repository = new FileRepository({ store: options.store, logger: options.logger });
    this.chunks = new ChunkedStore({
      repository: this.repository,
      threshold,
      maxFileSize: options.maxFileSize ?? DEFAULT_MAX_FILE_SIZE,
      logger: options.logger,
    });
  }

  get fileSizeThreshold(): number {
    return this.chunks.threshold;
  }

  get storeName(): string {
    return this.repository.storeName;
  }

  /** Prepare the backing store (indexes, schema version check) */
  async initialize(): Promise<void> {
    await this.repository.initialize();
  }

  /**
   * Store a file and return its id.
   *
   * Perennial files are deduplicated by content hash: storing the same bytes
   * again returns the id of the existing file. Temporary files are always
   * stored anew and can be retrieved once, within the configured lifetime.
   */
  async put(source: FileSource, options: PutOptions = {}): Promise<ObjectId> {
    const opened = openSource(source);
    const metadata: RecordMetadata = {
      temporary: options.temporary ?? false,
      ...(options.fileName !== undefined
        ? { fileName: options.fileName }
        : opened.defaultName !== undefined && { fileName: opened.defaultName }),
      ...(options.mimeType !== undefined && { mimeType: options.mimeType }),
    };

    if (metadata.temporary) {
      const id = new ObjectId();
      const written = await this.chunks.write(id, opened.open());
      const stored = await this.commit(id, written, metadata);
      this.sweepInBackground();
      return stored;
    }

    if (opened.restartable) {
      const contentHash = await hashContent(opened.open());
      const existing = await this.repository.findByHash(contentHash);
      if (existing) {
        this.logger.debug({ fileId: existing.toHexString() }, 'Deduplicated perennial file');
        return existing;
      }

      const id = new ObjectId();
      const digest = new ContentDigest();
      const written = await this.chunks.write(id, digest.tap(opened.open()));
      if (digest.digest() !== contentHash) {
        await this.chunks.discard(id, written.payload);
        throw new InconsistentPayloadError('source changed while it was being stored');
      }
      return this.commit(id, written, { ...metadata, contentHash });
    }

    // Single-pass source: hash while writing, then check for an existing copy
    const id = new ObjectId();
    const digest = new ContentDigest();
    const written = await this.chunks.write(id, digest.tap(opened.open()));
    const contentHash = digest.digest();

    let existing: ObjectId | null;
    try {
      existing = await this.repository.findByHash(contentHash);
    } catch (error) {
      await this.chunks.discard(id, written.payload);
      throw error;
    }
    if (existing) {
      await this.chunks.discard(id, written.payload);
      this.logger.debug({ fileId: existing.toHexString() }, 'Deduplicated perennial file');
      return existing;
    }
    return this.commit(id, written, { ...metadata, contentHash });
  }

  /**
   * Retrieve a file. Returns null for unknown ids and for temporary files
   * that have expired or were already retrieved.
   *
   * A retrieved temporary file is deleted once its payload has been handed
   * over in full.
   */
  async get(id: ObjectId): Promise<FileItem | null> {
    const record = await this.repository.load(id);
    if (!record) {
      return null;
    }

    const onComplete = record.temporary
      ? () => this.repository.reclaimInBackground(record.id)
      : undefined;
    const data = this.chunks.read(record, onComplete);

    return {
      id: record.id,
      ...(record.fileName !== undefined && { fileName: record.fileName }),
      ...(record.mimeType !== undefined && { mimeType: record.mimeType }),
      size: record.size,
      temporary: record.temporary,
      createdAt: record.createdAt,
      ...(record.expiresAt !== undefined && { expiresAt: record.expiresAt }),
      shape: record.payload.shape,
      data,
    };
  }

  encryptId(id: ObjectId): string {
    return this.codec.encrypt(id);
  }

  /** @throws InvalidTokenError for any token not issued under the current key */
  decryptIdToken(token: string): ObjectId {
    return this.codec.decrypt(token);
  }

  /**
   * Delete a file and its chunks.
   *
   * @returns false if no such file exists
   */
  async delete(id: ObjectId): Promise<boolean> {
    return this.repository.delete(id);
  }

  /** Delete every expired temporary file now; returns how many were removed */
  async reclaimExpired(): Promise<number> {
    return this.repository.reclaimExpired(new Date());
  }

  async healthy(): Promise<boolean> {
    return this.repository.healthy();
  }

  async close(): Promise<void> {
    await this.repository.close();
  }

  private async commit(
    id: ObjectId,
    written: WriteResult,
    metadata: RecordMetadata
  ): Promise<ObjectId> {
    const createdAt = new Date();
    const record: FileRecord = {
      id,
      ...metadata,
      size: written.size,
      consumed: false,
      createdAt,
      ...(metadata.temporary && {
        expiresAt: new Date(createdAt.getTime() + this.temporaryLifetimeMs),
      }),
      payload: written.payload,
    };

    let result: InsertResult;
    try {
      result = await this.repository.insert(record);
    } catch (error) {
      await this.chunks.discard(id, written.payload);
      throw error;
    }

    if (!result.created) {
      await this.chunks.discard(id, written.payload);
    }
    this.logger.debug(
      {
        fileId: result.id.toHexString(),
        size: written.size,
        shape: written.payload.shape,
        temporary: metadata.temporary,
      },
      result.created ? 'File stored' : 'Deduplicated perennial file'
    );
    return result.id;
  }

  private sweepInBackground(): void {
    if (this.sweeping) {
      return;
    }
    this.sweeping = true;
    void this.repository
      .reclaimExpired(new Date())
      .catch((error: unknown) => {
        this.logger.warn(
          { err: error instanceof Error ? error.message : error },
          'Expired temporary file sweep failed'
        );
      })
      .finally(() => {
        this.sweeping = false;
      });
  }
}

/**
 * Build a FileCenter from validated configuration.
 */
export function createFileCenter(
  config: FileCenterConfig,
  store: FileStore,
  logger: FastifyBaseLogger
): FileCenter {
  return new FileCenter({
    store,
    logger,
    codecKey: config.codecKey,
    fileSizeThreshold: config.fileSizeThreshold,
    temporaryLifetimeMs: config.temporaryFileLifetimeSeconds * 1000,
    maxFileSize: config.maxFileSize,
  });
}
