import { ObjectId } from 'mongodb';
import { describe, it, expect, beforeEach } from 'vitest';

import type { FileRecord } from '@/file-center/types.js';
import { MemoryFileStore } from '@/store/memory-store.js';

const CREATED_AT = new Date('2026-03-01T12:00:00.000Z');

function inlineRecord(overrides: Partial<FileRecord> = {}): FileRecord {
  return {
    id: new ObjectId(),
    contentHash: 'hash-a',
    size: 3,
    temporary: false,
    consumed: false,
    createdAt: CREATED_AT,
    payload: { shape: 'inline', data: Buffer.from('abc') },
    ...overrides,
  };
}

describe('MemoryFileStore', () => {
  let store: MemoryFileStore;

  beforeEach(() => {
    store = new MemoryFileStore();
  });

  it('should be named memory and always healthy', async () => {
    expect(store.name).toBe('memory');
    expect(await store.healthy()).toBe(true);
  });

  describe('insertItem', () => {
    it('should store a record and index its content hash', async () => {
      const record = inlineRecord();

      expect(await store.insertItem(record)).toBe('inserted');
      expect(await store.findItem(record.id)).toEqual(record);
      expect((await store.findIdByHash('hash-a'))?.equals(record.id)).toBe(true);
    });

    it('should report a duplicate hash without storing anything', async () => {
      await store.insertItem(inlineRecord());
      const second = inlineRecord();

      expect(await store.insertItem(second)).toBe('duplicate');
      expect(await store.findItem(second.id)).toBeNull();
    });

    it('should refuse to overwrite an existing id', async () => {
      const record = inlineRecord();
      await store.insertItem(record);

      await expect(store.insertItem({ ...record, contentHash: 'hash-b' })).rejects.toThrow(
        `Duplicate file id ${record.id.toHexString()}`
      );
    });

    it('should keep its own copy of inline bytes', async () => {
      const data = Buffer.from('abc');
      const record = inlineRecord({ payload: { shape: 'inline', data } });
      await store.insertItem(record);

      data.write('xyz');

      const found = await store.findItem(record.id);
      expect(found?.payload).toEqual({ shape: 'inline', data: Buffer.from('abc') });
    });
  });

  describe('consumeTemporary', () => {
    const temporary = (): FileRecord =>
      inlineRecord({
        contentHash: undefined,
        temporary: true,
        expiresAt: new Date(CREATED_AT.getTime() + 1000),
      });

    it('should consume a live temporary record once', async () => {
      const record = temporary();
      await store.insertItem(record);

      const first = await store.consumeTemporary(record.id, new Date(CREATED_AT.getTime() + 10));
      const second = await store.consumeTemporary(record.id, new Date(CREATED_AT.getTime() + 20));

      expect(first?.consumed).toBe(true);
      expect(second).toBeNull();
      expect((await store.findItem(record.id))?.consumed).toBe(true);
    });

    it('should not consume at or after the expiry instant', async () => {
      const record = temporary();
      await store.insertItem(record);

      const expiry = new Date(CREATED_AT.getTime() + 1000);

      expect(await store.consumeTemporary(record.id, expiry)).toBeNull();
      expect((await store.findItem(record.id))?.consumed).toBe(false);
    });

    it('should not consume a perennial record', async () => {
      const record = inlineRecord();
      await store.insertItem(record);

      expect(await store.consumeTemporary(record.id, CREATED_AT)).toBeNull();
    });
  });

  describe('deleteItem', () => {
    it('should remove the record and free its hash', async () => {
      const record = inlineRecord();
      await store.insertItem(record);

      expect(await store.deleteItem(record.id)).toEqual(record);
      expect(await store.findItem(record.id)).toBeNull();
      expect(await store.findIdByHash('hash-a')).toBeNull();
    });

    it('should return null for an unknown id', async () => {
      expect(await store.deleteItem(new ObjectId())).toBeNull();
    });
  });

  describe('chunks', () => {
    it('should store, read and delete chunks per parent', async () => {
      const parent = new ObjectId();
      const other = new ObjectId();
      await store.insertChunk(parent, 0, Buffer.from('HELLOWORLD'));
      await store.insertChunk(parent, 1, Buffer.from('!'));
      await store.insertChunk(other, 0, Buffer.from('x'));

      expect(await store.readChunk(parent, 1)).toEqual(Buffer.from('!'));
      expect(await store.readChunk(parent, 2)).toBeNull();
      expect(await store.deleteChunks(parent)).toBe(2);
      expect(store.stats()).toEqual({ items: 0, chunks: 1 });
    });

    it('should reject a second chunk at the same index', async () => {
      const parent = new ObjectId();
      await store.insertChunk(parent, 0, Buffer.from('a'));

      await expect(store.insertChunk(parent, 0, Buffer.from('b'))).rejects.toThrow(
        `Duplicate chunk 0 for file ${parent.toHexString()}`
      );
    });
  });

  it('should list temporaries expired at the given instant', async () => {
    const expired = inlineRecord({
      contentHash: undefined,
      temporary: true,
      expiresAt: new Date(CREATED_AT.getTime() + 1000),
    });
    const live = inlineRecord({
      contentHash: undefined,
      temporary: true,
      expiresAt: new Date(CREATED_AT.getTime() + 2000),
    });
    await store.insertItem(expired);
    await store.insertItem(live);
    await store.insertItem(inlineRecord());

    const now = new Date(CREATED_AT.getTime() + 1000);
    const ids = await store.findExpiredTemporaries(now, now);

    expect(ids.map((id) => id.toHexString())).toEqual([expired.id.toHexString()]);
  });

  it('should hold back a consumed temporary until its abandoned deadline', async () => {
    const record = inlineRecord({
      contentHash: undefined,
      temporary: true,
      expiresAt: new Date(CREATED_AT.getTime() + 1000),
    });
    await store.insertItem(record);
    await store.consumeTemporary(record.id, new Date(CREATED_AT.getTime() + 10));

    const now = new Date(CREATED_AT.getTime() + 5000);
    expect(await store.findExpiredTemporaries(now, new Date(CREATED_AT.getTime() + 999))).toEqual(
      []
    );

    const ids = await store.findExpiredTemporaries(now, new Date(CREATED_AT.getTime() + 1000));
    expect(ids.map((id) => id.toHexString())).toEqual([record.id.toHexString()]);
  });

  it('should drop everything on close', async () => {
    await store.insertItem(inlineRecord());
    await store.insertChunk(new ObjectId(), 0, Buffer.from('a'));

    await store.close();

    expect(store.stats()).toEqual({ items: 0, chunks: 0 });
  });
});
