// MongoDB client factory with connection event logging

import type { FastifyBaseLogger } from 'fastify';
import { MongoClient } from 'mongodb';

import type { StoreConfig } from './config.js';

/**
 * Create a MongoDB client. The driver connects on `connect()` or on the
 * first operation, whichever comes first.
 *
 * Binary fields come back as Node Buffers (`promoteBuffers`), which is what
 * the file store hands out for inline payloads and chunks.
 */
export function createMongoClient(
  config: StoreConfig['mongodb'],
  logger: FastifyBaseLogger
): MongoClient {
  const client = new MongoClient(config.uri, {
    serverSelectionTimeoutMS: config.serverSelectionTimeoutMs,
    promoteBuffers: true,
  });

  client.on('serverHeartbeatFailed', (event) => {
    logger.error(
      { err: event.failure.message, connectionId: event.connectionId },
      'MongoDB heartbeat failed'
    );
  });

  client.on('topologyClosed', () => {
    logger.info('MongoDB connection closed');
  });

  return client;
}
