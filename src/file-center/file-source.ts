// Ingestion side of `put`: every source kind becomes one lazy sequence of
// Buffers, so hashing and chunking have a single input path.

import { createReadStream } from 'node:fs';
import { basename } from 'node:path';

import type { FileSource } from './types.js';

export function fromPath(path: string): FileSource {
  return { kind: 'path', path };
}

export function fromBuffer(data: Uint8Array | string): FileSource {
  return { kind: 'buffer', data: typeof data === 'string' ? Buffer.from(data) : data };
}

export function fromStream(stream: AsyncIterable<Uint8Array>): FileSource {
  return { kind: 'stream', stream };
}

export interface OpenedSource {
  /** True when `open()` may be called again to read the same bytes */
  restartable: boolean;
  /** File name implied by the source itself (the basename of a path) */
  defaultName?: string;
  open(): AsyncIterable<Buffer>;
}

export function openSource(source: FileSource): OpenedSource {
  switch (source.kind) {
    case 'path':
      return {
        restartable: true,
        defaultName: basename(source.path),
        open: () => readPath(source.path),
      };
    case 'buffer': {
      const data = toBuffer(source.data);
      return {
        restartable: true,
        open: () => single(data),
      };
    }
    case 'stream': {
      let opened = false;
      return {
        restartable: false,
        open: () => {
          if (opened) {
            throw new Error('Stream source can only be read once');
          }
          opened = true;
          return normalize(source.stream);
        },
      };
    }
  }
}

async function* readPath(path: string): AsyncGenerator<Buffer> {
  for await (const chunk of createReadStream(path)) {
    yield toBuffer(chunk);
  }
}

async function* single(data: Buffer): AsyncGenerator<Buffer> {
  yield data;
}

async function* normalize(stream: AsyncIterable<unknown>): AsyncGenerator<Buffer> {
  for await (const chunk of stream) {
    yield toBuffer(chunk);
  }
}

/** Accepts whatever a byte stream may yield: Buffers, typed arrays or strings. */
export function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) {
    return chunk;
  }
  if (chunk instanceof Uint8Array) {
    return Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
  }
  if (typeof chunk === 'string') {
    return Buffer.from(chunk);
  }
  throw new TypeError('File source yielded a value that is not bytes');
}
