// Payload layout: inline vs. chunked, and reassembly on read.
//
// The shape is decided from the byte count alone: up to `threshold` bytes
// stay inline, anything larger is split into chunks of `chunkSize` bytes
// (the last one may be shorter). Input is buffered until it either ends or
// passes the threshold, so sources of unknown length are never chunked
// speculatively.

import { Readable } from 'node:stream';

import type { FastifyBaseLogger } from 'fastify';
import type { ObjectId } from 'mongodb';

import { InconsistentPayloadError, PayloadTooLargeError } from './errors.js';
import type { FileRepository } from './file-repository.js';
import { MAX_CHUNK_SIZE, type FileData, type FileRecord, type PayloadDescriptor } from './types.js';

export interface WriteResult {
  size: number;
  payload: PayloadDescriptor;
}

export class ChunkedStore {
  readonly threshold: number;
  readonly chunkSize: number;
  private readonly maxFileSize: number;
  private readonly repository: FileRepository;
  private readonly logger: FastifyBaseLogger;

  constructor(options: {
    repository: FileRepository;
    threshold: number;
    maxFileSize: number;
    logger: FastifyBaseLogger;
  }) {
    this.repository = options.repository;
    this.threshold = options.threshold;
    this.chunkSize = Math.min(options.threshold, MAX_CHUNK_SIZE);
    this.maxFileSize = options.maxFileSize;
    this.logger = options.logger;
  }

  /**
   * Consume `source` and lay it out for `parentId`. Chunks are written in
   * increasing index order. If anything fails after the first chunk landed,
   * the chunks written so far are discarded before the error is rethrown.
   */
  async write(parentId: ObjectId, source: AsyncIterable<Buffer>): Promise<WriteResult> {
    let pending: Buffer[] = [];
    let pendingLength = 0;
    let size = 0;
    let chunked = false;
    let chunkCount = 0;

    const flush = async (final: boolean): Promise<void> => {
      if (pendingLength === 0) {
        return;
      }
      const joined = pending.length === 1 ? pending[0] : Buffer.concat(pending, pendingLength);
      let offset = 0;
      while (joined.length - offset >= this.chunkSize) {
        await this.repository.insertChunk(
          parentId,
          chunkCount++,
          joined.subarray(offset, offset + this.chunkSize)
        );
        offset += this.chunkSize;
      }

      const rest = joined.subarray(offset);
      if (final && rest.length > 0) {
        await this.repository.insertChunk(parentId, chunkCount++, rest);
        pending = [];
        pendingLength = 0;
      } else {
        pending = rest.length > 0 ? [rest] : [];
        pendingLength = rest.length;
      }
    };

    try {
      for await (const piece of source) {
        if (piece.length === 0) {
          continue;
        }
        size += piece.length;
        if (size > this.maxFileSize) {
          throw new PayloadTooLargeError(this.maxFileSize);
        }

        pending.push(piece);
        pendingLength += piece.length;

        if (size > this.threshold) {
          chunked = true;
        }
        if (chunked && pendingLength >= this.chunkSize) {
          await flush(false);
        }
      }

      if (!chunked) {
        return {
          size,
          payload: { shape: 'inline', data: Buffer.concat(pending, pendingLength) },
        };
      }

      await flush(true);
      return { size, payload: { shape: 'chunked', chunkCount, chunkSize: this.chunkSize } };
    } catch (error) {
      if (chunkCount > 0) {
        await this.discard(parentId, { shape: 'chunked', chunkCount, chunkSize: this.chunkSize });
      }
      throw error;
    }
  }

  /**
   * Hand out a stored payload. Inline bytes come back as they are; chunked
   * files become a lazy stream that fetches one chunk at a time.
   *
   * `onComplete` runs once the whole payload has been delivered: immediately
   * for inline files, after the last chunk for chunked files.
   */
  read(record: FileRecord, onComplete?: () => void): FileData {
    const { payload } = record;
    const fileId = record.id.toHexString();

    if (payload.shape === 'inline') {
      if (payload.data.length !== record.size) {
        throw new InconsistentPayloadError(
          `file ${fileId} holds ${payload.data.length} inline bytes, expected ${record.size}`
        );
      }
      onComplete?.();
      return { kind: 'buffer', buffer: payload.data };
    }

    const { chunkCount, chunkSize } = payload;
    const expectedCount = Math.ceil(record.size / chunkSize);
    if (chunkCount !== expectedCount) {
      throw new InconsistentPayloadError(
        `file ${fileId} has ${chunkCount} chunks, expected ${expectedCount}`
      );
    }

    const repository = this.repository;
    const size = record.size;
    async function* chunks(): AsyncGenerator<Buffer> {
      for (let index = 0; index < chunkCount; index++) {
        const chunk = await repository.readChunk(record.id, index);
        if (!chunk) {
          throw new InconsistentPayloadError(`chunk ${index} of file ${fileId} is missing`);
        }
        const expected = index < chunkCount - 1 ? chunkSize : size - chunkSize * index;
        if (chunk.length !== expected) {
          throw new InconsistentPayloadError(
            `chunk ${index} of file ${fileId} has ${chunk.length} bytes, expected ${expected}`
          );
        }
        yield chunk;
      }
      onComplete?.();
    }

    return { kind: 'stream', stream: Readable.from(chunks(), { objectMode: false }) };
  }

  /** Remove the chunks behind a payload. Inline payloads live in the record itself. */
  async delete(parentId: ObjectId, payload: PayloadDescriptor): Promise<void> {
    if (payload.shape === 'chunked') {
      await this.repository.deleteChunks(parentId);
    }
  }

  /**
   * Best-effort delete of chunks that never got a record (failed write,
   * dedup hit after a single-pass write). Failures are logged, not thrown.
   */
  async discard(parentId: ObjectId, payload: PayloadDescriptor): Promise<void> {
    try {
      await this.delete(parentId, payload);
    } catch (error) {
      this.logger.warn(
        { err: error instanceof Error ? error.message : error, fileId: parentId.toHexString() },
        'Failed to discard orphaned chunks'
      );
    }
  }
}
