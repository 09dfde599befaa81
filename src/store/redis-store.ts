// Redis file store.
//
// Key layout (all under the configured prefix):
//   item:<id>          record metadata as JSON, timestamps in epoch ms
//   inline:<id>        inline payload bytes
//   chunk:<id>:<n>     chunk bytes
//   chunks:<id>        set of chunk indices written for <id>
//   hash:<sha3>        id of the perennial record holding this content
//   consumable:<id>    present while a temporary record may still be read;
//                      expires with the record
//   temporaries        sorted set of unconsumed temporary ids scored by expiry
//   consumed           sorted set of consumed temporary ids scored by expiry
//   settings:version   persisted schema version
//
// Inserts run as one Lua script so the hash claim and the record land
// together. Consuming a temporary deletes its consumable key and moves the
// id from `temporaries` to `consumed` in one script.

import type { Redis } from 'ioredis';
import { ObjectId } from 'mongodb';
import { z } from 'zod';

import { InconsistentPayloadError, StoreVersionError } from '../file-center/errors.js';
import type { FileRecord } from '../file-center/types.js';

import { disconnectRedis } from './redis-client.js';
import { STORE_SCHEMA_VERSION, type FileStore, type InsertOutcome } from './types.js';

const INSERT_SCRIPT = `
if redis.call('EXISTS', KEYS[1]) == 1 then
  return redis.error_reply('duplicate file id ' .. ARGV[1])
end
if ARGV[3] == '1' and not redis.call('SET', KEYS[3], ARGV[1], 'NX') then
  return 0
end
redis.call('SET', KEYS[1], ARGV[2])
if ARGV[4] == '1' then
  redis.call('SET', KEYS[2], ARGV[5])
end
if tonumber(ARGV[6]) > 0 then
  redis.call('SET', KEYS[4], '1', 'PX', ARGV[6])
  redis.call('ZADD', KEYS[5], ARGV[7], ARGV[1])
end
return 1
`;

const CONSUME_SCRIPT = `
if redis.call('DEL', KEYS[1]) == 0 then
  return 0
end
local expiry = redis.call('ZSCORE', KEYS[2], ARGV[1])
redis.call('ZREM', KEYS[2], ARGV[1])
if expiry then
  redis.call('ZADD', KEYS[3], expiry, ARGV[1])
end
return 1
`;

const DELETE_SCRIPT = `
if redis.call('DEL', KEYS[1]) == 0 then
  return 0
end
redis.call('DEL', KEYS[2], KEYS[4])
redis.call('ZREM', KEYS[5], ARGV[1])
redis.call('ZREM', KEYS[6], ARGV[1])
if ARGV[2] == '1' and redis.call('GET', KEYS[3]) == ARGV[1] then
  redis.call('DEL', KEYS[3])
end
return 1
`;

const CHUNK_SCRIPT = `
if not redis.call('SET', KEYS[1], ARGV[1], 'NX') then
  return 0
end
redis.call('SADD', KEYS[2], ARGV[2])
return 1
`;

const StoredItemSchema = z.object({
  id: z.string(),
  contentHash: z.string().optional(),
  size: z.number().int().nonnegative(),
  fileName: z.string().optional(),
  mimeType: z.string().optional(),
  temporary: z.boolean(),
  createdAt: z.number(),
  expiresAt: z.number().optional(),
  shape: z.enum(['inline', 'chunked']),
  chunkCount: z.number().int().nonnegative().optional(),
  chunkSize: z.number().int().positive().optional(),
});

type StoredItem = z.infer<typeof StoredItemSchema>;

export class RedisFileStore implements FileStore {
  readonly name = 'redis';

  private readonly redis: Redis;
  private readonly prefix: string;

  constructor(options: { redis: Redis; keyPrefix: string }) {
    this.redis = options.redis;
    this.prefix = options.keyPrefix;
  }

  async initialize(): Promise<void> {
    if (this.redis.status === 'wait') {
      await this.redis.connect();
    }

    const versionKey = this.key('settings:version');
    const stored = await this.redis.get(versionKey);
    if (stored === null) {
      await this.redis.set(versionKey, String(STORE_SCHEMA_VERSION), 'NX');
      return;
    }

    const version = Number(stored);
    if (!Number.isInteger(version) || version > STORE_SCHEMA_VERSION) {
      throw new StoreVersionError(version, STORE_SCHEMA_VERSION);
    }
  }

  async findIdByHash(contentHash: string): Promise<ObjectId | null> {
    const id = await this.redis.get(this.key(`hash:${contentHash}`));
    return id !== null && ObjectId.isValid(id) ? new ObjectId(id) : null;
  }

  async insertItem(record: FileRecord): Promise<InsertOutcome> {
    const id = record.id.toHexString();
    const { payload } = record;
    const ttlMs =
      record.temporary && record.expiresAt
        ? record.expiresAt.getTime() - record.createdAt.getTime()
        : 0;

    const result = await this.redis.eval(
      INSERT_SCRIPT,
      5,
      this.key(`item:${id}`),
      this.key(`inline:${id}`),
      this.key(`hash:${record.contentHash ?? ''}`),
      this.key(`consumable:${id}`),
      this.key('temporaries'),
      id,
      JSON.stringify(toStoredItem(record)),
      record.contentHash !== undefined ? '1' : '0',
      payload.shape === 'inline' ? '1' : '0',
      payload.shape === 'inline' ? payload.data : '',
      String(Math.max(ttlMs, 0)),
      String(record.expiresAt?.getTime() ?? 0)
    );

    return result === 0 ? 'duplicate' : 'inserted';
  }

  async findItem(id: ObjectId): Promise<FileRecord | null> {
    const hex = id.toHexString();
    const raw = await this.redis.get(this.key(`item:${hex}`));
    if (raw === null) {
      return null;
    }

    const stored = parseStoredItem(raw, hex);
    let inline: Buffer | null = null;
    if (stored.shape === 'inline') {
      inline = await this.redis.getBuffer(this.key(`inline:${hex}`));
    }
    const consumed = stored.temporary
      ? (await this.redis.zscore(this.key('consumed'), hex)) !== null
      : false;

    return fromStoredItem(stored, consumed, inline);
  }

  async consumeTemporary(id: ObjectId, now: Date): Promise<FileRecord | null> {
    const hex = id.toHexString();
    const removed = await this.redis.eval(
      CONSUME_SCRIPT,
      3,
      this.key(`consumable:${hex}`),
      this.key('temporaries'),
      this.key('consumed'),
      hex
    );
    if (removed !== 1) {
      return null;
    }

    const record = await this.findItem(id);
    if (!record || !record.temporary || !record.expiresAt) {
      return null;
    }
    if (record.expiresAt.getTime() <= now.getTime()) {
      return null;
    }
    return { ...record, consumed: true };
  }

  async deleteItem(id: ObjectId): Promise<FileRecord | null> {
    const record = await this.findItem(id);
    if (!record) {
      return null;
    }

    const hex = id.toHexString();
    const result = await this.redis.eval(
      DELETE_SCRIPT,
      6,
      this.key(`item:${hex}`),
      this.key(`inline:${hex}`),
      this.key(`hash:${record.contentHash ?? ''}`),
      this.key(`consumable:${hex}`),
      this.key('temporaries'),
      this.key('consumed'),
      hex,
      record.contentHash !== undefined ? '1' : '0'
    );

    return result === 1 ? record : null;
  }

  async insertChunk(parentId: ObjectId, index: number, data: Buffer): Promise<void> {
    const hex = parentId.toHexString();
    const written = await this.redis.eval(
      CHUNK_SCRIPT,
      2,
      this.key(`chunk:${hex}:${index}`),
      this.key(`chunks:${hex}`),
      data,
      String(index)
    );
    if (written !== 1) {
      throw new Error(`Duplicate chunk ${index} for file ${hex}`);
    }
  }

  async readChunk(parentId: ObjectId, index: number): Promise<Buffer | null> {
    return this.redis.getBuffer(this.key(`chunk:${parentId.toHexString()}:${index}`));
  }

  async deleteChunks(parentId: ObjectId): Promise<number> {
    const hex = parentId.toHexString();
    const indexKey = this.key(`chunks:${hex}`);
    const indices = await this.redis.smembers(indexKey);
    if (indices.length === 0) {
      return 0;
    }

    const removed = await this.redis.del(...indices.map((n) => this.key(`chunk:${hex}:${n}`)));
    await this.redis.del(indexKey);
    return removed;
  }

  async findExpiredTemporaries(now: Date, abandonedBefore: Date): Promise<ObjectId[]> {
    const [unconsumed, abandoned] = await Promise.all([
      this.redis.zrangebyscore(this.key('temporaries'), '-inf', now.getTime()),
      this.redis.zrangebyscore(this.key('consumed'), '-inf', abandonedBefore.getTime()),
    ]);
    return [...unconsumed, ...abandoned]
      .filter((id) => ObjectId.isValid(id))
      .map((id) => new ObjectId(id));
  }

  async healthy(): Promise<boolean> {
    try {
      return (await this.redis.ping()) === 'PONG';
    } catch {
      return false;
    }
  }

  async close(): Promise<void> {
    await disconnectRedis(this.redis);
  }

  private key(suffix: string): string {
    return `${this.prefix}${suffix}`;
  }
}

function toStoredItem(record: FileRecord): StoredItem {
  const { payload } = record;
  return {
    id: record.id.toHexString(),
    ...(record.contentHash !== undefined && { contentHash: record.contentHash }),
    size: record.size,
    ...(record.fileName !== undefined && { fileName: record.fileName }),
    ...(record.mimeType !== undefined && { mimeType: record.mimeType }),
    temporary: record.temporary,
    createdAt: record.createdAt.getTime(),
    ...(record.expiresAt !== undefined && { expiresAt: record.expiresAt.getTime() }),
    shape: payload.shape,
    ...(payload.shape === 'chunked' && {
      chunkCount: payload.chunkCount,
      chunkSize: payload.chunkSize,
    }),
  };
}

function parseStoredItem(raw: string, hex: string): StoredItem {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new InconsistentPayloadError(`file ${hex} has unreadable metadata`);
  }
  const parsed = StoredItemSchema.safeParse(json);
  if (!parsed.success) {
    throw new InconsistentPayloadError(`file ${hex} has malformed metadata`);
  }
  return parsed.data;
}

function fromStoredItem(stored: StoredItem, consumed: boolean, inline: Buffer | null): FileRecord {
  let payload: FileRecord['payload'];
  if (stored.shape === 'inline') {
    if (!inline) {
      throw new InconsistentPayloadError(`file ${stored.id} has no inline data`);
    }
    payload = { shape: 'inline', data: inline };
  } else {
    if (stored.chunkCount === undefined || stored.chunkSize === undefined) {
      throw new InconsistentPayloadError(`file ${stored.id} has no chunk layout`);
    }
    payload = { shape: 'chunked', chunkCount: stored.chunkCount, chunkSize: stored.chunkSize };
  }

  return {
    id: new ObjectId(stored.id),
    ...(stored.contentHash !== undefined && { contentHash: stored.contentHash }),
    size: stored.size,
    ...(stored.fileName !== undefined && { fileName: stored.fileName }),
    ...(stored.mimeType !== undefined && { mimeType: stored.mimeType }),
    temporary: stored.temporary,
    consumed,
    createdAt: new Date(stored.createdAt),
    ...(stored.expiresAt !== undefined && { expiresAt: new Date(stored.expiresAt) }),
    payload,
  };
}
