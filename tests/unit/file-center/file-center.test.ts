import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Readable } from 'node:stream';

import type { FastifyBaseLogger } from 'fastify';
import { ObjectId } from 'mongodb';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import { FileSizeThresholdError } from '@/file-center/errors.js';
import { createFileCenter, FileCenter } from '@/file-center/file-center.js';
import { readFileData } from '@/file-center/file-data.js';
import { fromBuffer, fromPath, fromStream } from '@/file-center/file-source.js';
import { MemoryFileStore } from '@/store/memory-store.js';

// ---------------------------------------------------------------------------
// Mock logger
// ---------------------------------------------------------------------------

const mockLogger = {
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  fatal: vi.fn(),
  trace: vi.fn(),
  child: vi.fn(),
} as unknown as FastifyBaseLogger;

const CODEC_KEY = 'test-secret-codec-key';
const T0 = new Date('2026-03-01T12:00:00.000Z');

function createCenter(
  store: MemoryFileStore,
  overrides: Partial<ConstructorParameters<typeof FileCenter>[0]> = {}
): FileCenter {
  return new FileCenter({
    store,
    codecKey: CODEC_KEY,
    logger: mockLogger,
    fileSizeThreshold: 10,
    temporaryLifetimeMs: 1000,
    ...overrides,
  });
}

describe('FileCenter', () => {
  let store: MemoryFileStore;
  let center: FileCenter;

  beforeEach(() => {
    vi.clearAllMocks();
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(T0);
    store = new MemoryFileStore();
    center = createCenter(store);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('threshold 10, lifetime 1s', () => {
    it('should chunk an 11-byte perennial file and deduplicate it', async () => {
      const id = await center.put(fromBuffer('HELLOWORLD!'));

      const item = await center.get(id);
      expect(item?.shape).toBe('chunked');
      expect(item?.size).toBe(11);
      expect(store.stats()).toEqual({ items: 1, chunks: 2 });
      expect(await store.readChunk(id, 0)).toEqual(Buffer.from('HELLOWORLD'));
      expect(await store.readChunk(id, 1)).toEqual(Buffer.from('!'));

      const again = await center.put(fromBuffer('HELLOWORLD!'));
      expect(again.equals(id)).toBe(true);
      expect(store.stats()).toEqual({ items: 1, chunks: 2 });
    });

    it('should hand out a temporary file once', async () => {
      const id = await center.put(fromBuffer('HI!!!'), { temporary: true });

      const first = await center.get(id);
      expect(first?.shape).toBe('inline');
      expect(first && (await readFileData(first.data)).toString()).toBe('HI!!!');

      expect(await center.get(id)).toBeNull();
    });
  });

  describe('put', () => {
    it('should keep a file of exactly the threshold inline', async () => {
      const id = await center.put(fromBuffer('0123456789'));

      const item = await center.get(id);
      expect(item?.shape).toBe('inline');
      expect(item?.data).toEqual({ kind: 'buffer', buffer: Buffer.from('0123456789') });
      expect(store.stats().chunks).toBe(0);
    });

    it('should store an empty file inline', async () => {
      const id = await center.put(fromBuffer(''));

      const item = await center.get(id);
      expect(item?.size).toBe(0);
      expect(item && (await readFileData(item.data)).length).toBe(0);
    });

    it('should deduplicate a stream source and drop the chunks it wrote', async () => {
      const id = await center.put(fromBuffer('HELLOWORLD!'));

      const again = await center.put(
        fromStream(Readable.from([Buffer.from('HELLO'), Buffer.from('WORLD!')]))
      );

      expect(again.equals(id)).toBe(true);
      expect(store.stats()).toEqual({ items: 1, chunks: 2 });
    });

    it('should give distinct content distinct ids', async () => {
      const a = await center.put(fromBuffer('alpha'));
      const b = await center.put(fromBuffer('bravo'));

      expect(a.equals(b)).toBe(false);
    });

    it('should store temporary copies of identical content separately', async () => {
      const perennial = await center.put(fromBuffer('HELLOWORLD!'));
      const first = await center.put(fromBuffer('HELLOWORLD!'), { temporary: true });
      const second = await center.put(fromBuffer('HELLOWORLD!'), { temporary: true });

      expect(first.equals(perennial)).toBe(false);
      expect(first.equals(second)).toBe(false);
      expect(store.stats()).toEqual({ items: 3, chunks: 6 });

      const record = await store.findItem(first);
      expect(record?.contentHash).toBeUndefined();
      expect(record?.expiresAt).toEqual(new Date(T0.getTime() + 1000));
    });

    it('should name a path source after its basename', async () => {
      const dir = mkdtempSync(join(tmpdir(), 'file-center-'));
      try {
        const path = join(dir, 'report.txt');
        writeFileSync(path, 'quarterly numbers');

        const id = await center.put(fromPath(path), { mimeType: 'text/plain' });

        const item = await center.get(id);
        expect(item?.fileName).toBe('report.txt');
        expect(item?.mimeType).toBe('text/plain');
        expect(item && (await readFileData(item.data)).toString()).toBe('quarterly numbers');
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });

    it('should prefer an explicit file name over the source name', async () => {
      const dir = mkdtempSync(join(tmpdir(), 'file-center-'));
      try {
        const path = join(dir, 'upload.bin');
        writeFileSync(path, 'abc');

        const id = await center.put(fromPath(path), { fileName: 'renamed.bin' });

        expect((await center.get(id))?.fileName).toBe('renamed.bin');
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });

    it('should reject input above the maximum file size and keep nothing', async () => {
      center = createCenter(store, { maxFileSize: 16 });

      await expect(center.put(fromBuffer('x'.repeat(17)))).rejects.toMatchObject({
        code: 'PAYLOAD_TOO_LARGE',
        statusCode: 413,
      });
      expect(store.stats()).toEqual({ items: 0, chunks: 0 });
    });

    it('should refuse a buffer that changes while it is being stored', async () => {
      const data = new Uint8Array(Buffer.from('HELLOWORLD!'));
      vi.spyOn(store, 'findIdByHash').mockImplementation(async () => {
        data[0] = 0x4a;
        return null;
      });

      await expect(center.put(fromBuffer(data))).rejects.toMatchObject({
        code: 'PAYLOAD_INCONSISTENT',
        message: 'Stored payload is inconsistent: source changed while it was being stored',
      });
      expect(store.stats()).toEqual({ items: 0, chunks: 0 });
    });

    it('should drop written chunks when the record insert fails', async () => {
      vi.spyOn(store, 'insertItem').mockRejectedValue(new Error('write concern timeout'));

      await expect(center.put(fromBuffer('HELLOWORLD!'))).rejects.toMatchObject({
        code: 'STORE_UNAVAILABLE',
      });
      expect(store.stats()).toEqual({ items: 0, chunks: 0 });
    });

    it('should drop a stream source\'s chunks when the dedup lookup fails', async () => {
      vi.spyOn(store, 'findIdByHash').mockRejectedValue(new Error('connection refused'));

      await expect(
        center.put(fromStream(Readable.from([Buffer.from('HELLOWORLD!')])))
      ).rejects.toMatchObject({ code: 'STORE_UNAVAILABLE' });
      expect(store.stats()).toEqual({ items: 0, chunks: 0 });
    });

    it('should surface an unreachable store as STORE_UNAVAILABLE', async () => {
      vi.spyOn(store, 'findIdByHash').mockRejectedValue(new Error('connection refused'));

      await expect(center.put(fromBuffer('abc'))).rejects.toMatchObject({
        code: 'STORE_UNAVAILABLE',
        message: 'File store unavailable during findByHash',
      });
    });
  });

  describe('get', () => {
    it('should return null for an unknown id', async () => {
      expect(await center.get(new ObjectId())).toBeNull();
    });

    it('should return a perennial file on every call', async () => {
      const id = await center.put(fromBuffer('HELLOWORLD!'), { fileName: 'hello.txt' });

      for (let i = 0; i < 3; i++) {
        const item = await center.get(id);
        expect(item?.fileName).toBe('hello.txt');
        expect(item?.temporary).toBe(false);
        expect(item?.expiresAt).toBeUndefined();
        expect(item && (await readFileData(item.data)).toString()).toBe('HELLOWORLD!');
      }
    });

    it('should serve a temporary file just before its expiry', async () => {
      const id = await center.put(fromBuffer('HI!!!'), { temporary: true });
      vi.setSystemTime(T0.getTime() + 999);

      const item = await center.get(id);

      expect(item?.temporary).toBe(true);
      expect(item?.expiresAt).toEqual(new Date(T0.getTime() + 1000));
    });

    it('should treat a temporary file as gone at its expiry instant', async () => {
      const id = await center.put(fromBuffer('HI!!!'), { temporary: true });
      vi.setSystemTime(T0.getTime() + 1000);

      expect(await center.get(id)).toBeNull();
      await vi.waitFor(() => expect(store.stats().items).toBe(0));
    });

    it('should delete an inline temporary file after handing it out', async () => {
      const id = await center.put(fromBuffer('HI!!!'), { temporary: true });

      await center.get(id);

      await vi.waitFor(() => expect(store.stats()).toEqual({ items: 0, chunks: 0 }));
    });

    it('should delete a chunked temporary file once it has been streamed', async () => {
      const id = await center.put(fromBuffer('HELLOWORLD!'), { temporary: true });

      const item = await center.get(id);
      expect(item?.shape).toBe('chunked');
      expect(item && (await readFileData(item.data)).toString()).toBe('HELLOWORLD!');

      await vi.waitFor(() => expect(store.stats()).toEqual({ items: 0, chunks: 0 }));
      expect(await center.get(id)).toBeNull();
    });

    it('should finish streaming a temporary file while a sweep runs past its expiry', async () => {
      const content = 'A'.repeat(40_000);
      const id = await center.put(fromBuffer(content), { temporary: true });

      const item = await center.get(id);
      if (item?.data.kind !== 'stream') {
        throw new Error('expected a chunked temporary file');
      }
      const iterator = item.data.stream[Symbol.asyncIterator]();
      const parts: Buffer[] = [(await iterator.next()).value];

      vi.setSystemTime(T0.getTime() + 1500);
      expect(await center.get(id)).toBeNull();
      await center.put(fromBuffer('x'), { temporary: true });
      expect(await center.reclaimExpired()).toBe(0);

      for (let next = await iterator.next(); !next.done; next = await iterator.next()) {
        parts.push(next.value);
      }
      expect(Buffer.concat(parts).toString()).toBe(content);
      await vi.waitFor(() => expect(store.stats()).toEqual({ items: 1, chunks: 0 }));
    });

    it('should run at most one background sweep at a time', async () => {
      let release: (ids: ObjectId[]) => void = () => undefined;
      const findExpired = vi
        .spyOn(store, 'findExpiredTemporaries')
        .mockReturnValueOnce(new Promise<ObjectId[]>((resolve) => (release = resolve)));

      await center.put(fromBuffer('one'), { temporary: true });
      await center.put(fromBuffer('two'), { temporary: true });
      expect(findExpired).toHaveBeenCalledTimes(1);

      release([]);
      await vi.waitFor(async () => {
        await center.put(fromBuffer('three'), { temporary: true });
        expect(findExpired).toHaveBeenCalledTimes(2);
      });
    });

    it('should let exactly one of two concurrent gets have a temporary file', async () => {
      const id = await center.put(fromBuffer('HI!!!'), { temporary: true });

      const results = await Promise.all([center.get(id), center.get(id)]);

      expect(results.filter((item) => item !== null)).toHaveLength(1);
    });
  });

  describe('tokens', () => {
    it('should round-trip an id through its token', async () => {
      const id = await center.put(fromBuffer('abc'));

      const token = center.encryptId(id);

      expect(token).toMatch(/^[A-Za-z0-9_-]{38}$/);
      expect(center.decryptIdToken(token).equals(id)).toBe(true);
    });

    it('should reject a token issued under another key', () => {
      const other = createCenter(store, { codecKey: 'another-test-secret' });
      const token = other.encryptId(new ObjectId());

      expect(() => center.decryptIdToken(token)).toThrow('Invalid file token');
    });
  });

  describe('delete', () => {
    it('should remove a chunked file and its chunks', async () => {
      const id = await center.put(fromBuffer('HELLOWORLD!'));

      expect(await center.delete(id)).toBe(true);

      expect(store.stats()).toEqual({ items: 0, chunks: 0 });
      expect(await center.get(id)).toBeNull();
    });

    it('should store the same content under a new id after a delete', async () => {
      const id = await center.put(fromBuffer('HELLOWORLD!'));
      await center.delete(id);

      const again = await center.put(fromBuffer('HELLOWORLD!'));

      expect(again.equals(id)).toBe(false);
    });

    it('should report false for an unknown id', async () => {
      expect(await center.delete(new ObjectId())).toBe(false);
    });
  });

  describe('reclaimExpired', () => {
    it('should remove temporaries whose lifetime has ended', async () => {
      await center.put(fromBuffer('one'), { temporary: true });
      await center.put(fromBuffer('HELLOWORLD!'), { temporary: true });
      await center.put(fromBuffer('kept'));
      vi.setSystemTime(T0.getTime() + 1000);

      expect(await center.reclaimExpired()).toBe(2);
      expect(store.stats()).toEqual({ items: 1, chunks: 0 });
    });
  });

  describe('configuration', () => {
    it('should reject a zero threshold', () => {
      expect(() => createCenter(store, { fileSizeThreshold: 0 })).toThrow(FileSizeThresholdError);
    });

    it('should reject a threshold above the inline limit', () => {
      expect(() => createCenter(store, { fileSizeThreshold: 16770001 })).toThrow(
        'File size threshold 16770001 is out of range'
      );
    });

    it('should accept the largest threshold', () => {
      expect(createCenter(store, { fileSizeThreshold: 16770000 }).fileSizeThreshold).toBe(
        16770000
      );
    });

    it('should apply defaults', () => {
      const defaults = new FileCenter({ store, codecKey: CODEC_KEY, logger: mockLogger });

      expect(defaults.fileSizeThreshold).toBe(262144);
      expect(defaults.temporaryLifetimeMs).toBe(60000);
      expect(defaults.storeName).toBe('memory');
    });

    it('should build from validated configuration', () => {
      const built = createFileCenter(
        {
          fileSizeThreshold: 10,
          temporaryFileLifetimeSeconds: 1,
          maxFileSize: 1024,
          codecKey: CODEC_KEY,
        },
        store,
        mockLogger
      );

      expect(built.fileSizeThreshold).toBe(10);
      expect(built.temporaryLifetimeMs).toBe(1000);
    });
  });
});
