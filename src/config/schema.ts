import { z } from 'zod';

import { FileCenterConfigSchema } from '../file-center/config.js';
import { StoreConfigSchema } from '../store/config.js';

export const ConfigSchema = z.object({
  server: z
    .object({
      host: z.string().default('0.0.0.0'),
      port: z.number().int().min(1).max(65535).default(3000),
    })
    .default(() => ({ host: '0.0.0.0', port: 3000 })),

  logging: z
    .object({
      level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
      pretty: z.boolean().default(false),
    })
    .default(() => ({ level: 'info' as const, pretty: false })),

  // Optional Sentry integration
  sentry: z
    .object({
      dsn: z.string().url(),
      environment: z.string().default('development'),
      tracesSampleRate: z.number().min(0).max(1).default(0.1),
    })
    .optional(),

  // Environment mode
  env: z.enum(['development', 'production', 'test']).default('development'),

  // Rate limiting configuration
  rateLimit: z
    .object({
      global: z.number().int().min(1).default(100),
      sensitive: z.number().int().min(1).default(20),
      windowMs: z.number().int().min(1000).default(60000),
    })
    .default(() => ({ global: 100, sensitive: 20, windowMs: 60000 })),

  // File center: layout threshold, temporary lifetime, size cap, token key
  fileCenter: FileCenterConfigSchema,

  // Backing store (MongoDB, Redis or in-process memory)
  store: StoreConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;
