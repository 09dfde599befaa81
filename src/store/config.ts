import { z } from 'zod';

/**
 * Backing store configuration Zod schema.
 *
 * SECURITY: `redis.password` and credentials embedded in `mongodb.uri` are
 * sensitive. They must never appear in logs.
 */
export const StoreConfigSchema = z
  .object({
    /** Which backend persists file records and chunks */
    backend: z.enum(['mongodb', 'redis', 'memory']).default('mongodb'),

    mongodb: z
      .object({
        /** Connection string (sensitive when it carries credentials) */
        uri: z.string().min(1).default('mongodb://127.0.0.1:27017'),
        database: z.string().min(1).default('file_center'),
        /** Milliseconds to wait for a reachable server before an operation fails */
        serverSelectionTimeoutMs: z.number().int().min(100).max(60000).default(5000),
      })
      .default(() => ({
        uri: 'mongodb://127.0.0.1:27017',
        database: 'file_center',
        serverSelectionTimeoutMs: 5000,
      })),

    redis: z
      .object({
        host: z.string().default('127.0.0.1'),
        port: z.number().int().min(1).max(65535).default(6379),
        /** Redis password (sensitive - never log). Optional for local dev. */
        password: z.string().optional(),
        /** Redis username (Redis 6+ ACL). Optional. */
        username: z.string().optional(),
        /** Redis database number (0-15). Default 0. */
        db: z.number().int().min(0).max(15).default(0),
        /** Prefix for every key the store writes */
        keyPrefix: z.string().default('fc:'),
      })
      .default(() => ({ host: '127.0.0.1', port: 6379, db: 0, keyPrefix: 'fc:' })),
  })
  .default(() => ({
    backend: 'mongodb' as const,
    mongodb: {
      uri: 'mongodb://127.0.0.1:27017',
      database: 'file_center',
      serverSelectionTimeoutMs: 5000,
    },
    redis: { host: '127.0.0.1', port: 6379, db: 0, keyPrefix: 'fc:' },
  }));

export type StoreConfig = z.infer<typeof StoreConfigSchema>;
