// file-center server type definitions

import type { Config } from '../config/index.js';
import type { FileCenter } from '../file-center/file-center.js';

// Augment Fastify types
declare module 'fastify' {
  interface FastifyInstance {
    config: Config;
    fileCenter: FileCenter;
  }
}
