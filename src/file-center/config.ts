import { z } from 'zod';

import { DEFAULT_FILE_SIZE_THRESHOLD, MAX_FILE_SIZE_THRESHOLD } from './types.js';

/** 1 GiB */
export const DEFAULT_MAX_FILE_SIZE = 1024 * 1024 * 1024;

/**
 * File center configuration Zod schema.
 *
 * SECURITY: `codecKey` protects every issued token. It must never appear in
 * logs, and changing it invalidates all tokens handed out under the old key.
 */
export const FileCenterConfigSchema = z.object({
  /** Files up to this many bytes are stored inline, larger ones in chunks */
  fileSizeThreshold: z
    .number()
    .int()
    .min(1)
    .max(MAX_FILE_SIZE_THRESHOLD)
    .default(DEFAULT_FILE_SIZE_THRESHOLD),

  /** How long a temporary file stays retrievable (seconds) */
  temporaryFileLifetimeSeconds: z.number().int().min(1).max(86400).default(60),

  /** Hard upper bound on a single file (bytes) */
  maxFileSize: z.number().int().min(1).default(DEFAULT_MAX_FILE_SIZE),

  /** Secret for the id token codec (sensitive - never log) */
  codecKey: z.string().min(16, 'codecKey must be at least 16 characters'),
});

export type FileCenterConfig = z.infer<typeof FileCenterConfigSchema>;
