import { randomUUID } from 'node:crypto';

import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import multipart from '@fastify/multipart';
import rateLimit from '@fastify/rate-limit';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import type { FastifyInstance } from 'fastify';
import fastify from 'fastify';
import {
  jsonSchemaTransform,
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod';

import type { Config } from './config/index.js';
import { createFileCenter } from './file-center/file-center.js';
import { errorHandlerPlugin } from './plugins/error-handler.js';
import { requestLoggerPlugin } from './plugins/request-logger.js';
import { deleteRoutesPlugin } from './routes/delete.js';
import { downloadRoutesPlugin } from './routes/download.js';
import { healthRoutesPlugin } from './routes/health.js';
import { uploadRoutesPlugin } from './routes/upload.js';
import { createFileStore, type FileStore } from './store/index.js';

// Import types to ensure augmentation is loaded
import './types/index.js';

export interface CreateServerOptions {
  config: Config;
  /** Pre-built store, used instead of the one `config.store` describes */
  store?: FileStore;
}

export async function createServer(options: CreateServerOptions): Promise<FastifyInstance> {
  const { config } = options;
  const isDev = config.env === 'development';

  const server = fastify({
    logger: {
      level: config.logging.level,
      transport: config.logging.pretty
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
    },
    // Request ID handling
    requestIdHeader: 'x-request-id',
    genReqId: () => randomUUID(),
    // Disable default request logging (we use custom plugin)
    disableRequestLogging: true,
    // Security: Strict body limit (50KB) for non-multipart bodies
    bodyLimit: 51200,
  });

  // Zod type provider compilers (enables Zod schemas in route schema declarations)
  server.setValidatorCompiler(validatorCompiler);
  server.setSerializerCompiler(serializerCompiler);

  // Decorate server with config for access in routes
  server.decorate('config', config);

  // Security headers
  await server.register(helmet, {
    global: true,
    // CSP can be customized per-route if needed
    contentSecurityPolicy: isDev ? false : undefined,
  });

  // Rate limiting
  await server.register(rateLimit, {
    max: config.rateLimit.global,
    timeWindow: config.rateLimit.windowMs,
    // use default in-memory store for now
  });

  // CORS - permissive in dev, restrictive in prod
  await server.register(cors, {
    origin: isDev ? true : false,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID'],
    exposedHeaders: ['Content-Disposition', 'X-Request-ID'],
  });

  // Multipart support (file uploads), capped at the configured maximum file size
  await server.register(multipart, {
    limits: { fileSize: config.fileCenter.maxFileSize, files: 1 },
  });

  // Custom plugins
  await server.register(errorHandlerPlugin, { isDev });
  await server.register(requestLoggerPlugin, { isDev });

  // ---- OpenAPI documentation ----
  await server.register(swagger, {
    openapi: {
      openapi: '3.0.3',
      info: {
        title: 'File Center',
        description:
          'Content-addressed file storage with deduplicated perennial files and single-use temporary files.',
        version: '1.0.0',
      },
      servers: [{ url: 'http://localhost:3000', description: 'Development' }],
      tags: [
        { name: 'Health', description: 'Server health and store status' },
        { name: 'Files', description: 'File upload, download and deletion' },
      ],
    },
    transform: jsonSchemaTransform,
  });

  await server.register(swaggerUi, {
    routePrefix: '/docs',
  });

  // ---- File center initialization ----
  const store = options.store ?? createFileStore(config.store, server.log);
  const fileCenter = createFileCenter(config.fileCenter, store, server.log);
  try {
    await fileCenter.initialize();
  } catch (error) {
    server.log.error(
      { err: error instanceof Error ? error.message : 'Unknown error', backend: store.name },
      'File store initialization failed'
    );
    await store.close().catch((closeError: unknown) => {
      server.log.warn(
        { err: closeError instanceof Error ? closeError.message : closeError },
        'File store close after failed initialization failed'
      );
    });
    throw error;
  }
  server.decorate('fileCenter', fileCenter);

  server.log.info(
    {
      backend: store.name,
      fileSizeThreshold: config.fileCenter.fileSizeThreshold,
      temporaryFileLifetimeSeconds: config.fileCenter.temporaryFileLifetimeSeconds,
    },
    'File center initialized'
  );

  // Shutdown hook for store disconnect
  server.addHook('onClose', async () => {
    await fileCenter.close();
    server.log.info('File center shutdown complete');
  });

  // Routes
  await server.register(healthRoutesPlugin);
  await server.register(uploadRoutesPlugin);
  await server.register(downloadRoutesPlugin);
  await server.register(deleteRoutesPlugin);

  return server;
}
