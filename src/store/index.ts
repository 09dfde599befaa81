// Store module barrel export and factory function.

import type { FastifyBaseLogger } from 'fastify';

import type { StoreConfig } from './config.js';
import { MemoryFileStore } from './memory-store.js';
import { createMongoClient } from './mongo-client.js';
import { MongoFileStore } from './mongo-store.js';
import { createRedisClient } from './redis-client.js';
import { RedisFileStore } from './redis-store.js';
import type { FileStore } from './types.js';

export type { FileStore, InsertOutcome } from './types.js';
export { STORE_SCHEMA_VERSION } from './types.js';
export { StoreConfigSchema, type StoreConfig } from './config.js';
export { MemoryFileStore } from './memory-store.js';
export { MongoFileStore } from './mongo-store.js';
export { RedisFileStore } from './redis-store.js';
export { createMongoClient } from './mongo-client.js';
export { createRedisClient, disconnectRedis } from './redis-client.js';

/**
 * Create a file store based on configuration. The store is not connected
 * until `initialize()` is called.
 */
export function createFileStore(config: StoreConfig, logger: FastifyBaseLogger): FileStore {
  switch (config.backend) {
    case 'memory':
      return new MemoryFileStore();
    case 'redis':
      return new RedisFileStore({
        redis: createRedisClient(config.redis, logger),
        keyPrefix: config.redis.keyPrefix,
      });
    case 'mongodb':
    default:
      return new MongoFileStore({
        client: createMongoClient(config.mongodb, logger),
        database: config.mongodb.database,
      });
  }
}
