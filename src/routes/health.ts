import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';

import type { FileCenter } from '../file-center/file-center.js';

// Read version once at startup (not on every request)
const packageJson = JSON.parse(readFileSync(resolve(process.cwd(), 'package.json'), 'utf-8')) as {
  version: string;
};
const APP_VERSION = packageJson.version;

interface DependencyStatus {
  status: 'up' | 'down';
  latency?: number;
  error?: string;
}

interface HealthResponse {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  version: string;
  uptime: number;
  /** Backing store name (mongodb, redis, memory) */
  store: string;
  dependencies: Record<string, DependencyStatus>;
}

// Dependency check functions

async function checkStore(fileCenter: FileCenter): Promise<DependencyStatus> {
  const start = Date.now();
  try {
    const healthy = await fileCenter.healthy();
    return {
      status: healthy ? 'up' : 'down',
      latency: Date.now() - start,
    };
  } catch (err) {
    return {
      status: 'down',
      latency: Date.now() - start,
      error: err instanceof Error ? err.message : 'Unknown error',
    };
  }
}

const healthRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  fastify.get<{ Reply: HealthResponse }>('/health', async (_request, reply) => {
    const dependencies: Record<string, DependencyStatus> = {
      store: await checkStore(fastify.fileCenter),
    };

    const allUp = Object.values(dependencies).every((d) => d.status === 'up');
    const status: HealthResponse['status'] = allUp ? 'healthy' : 'unhealthy';

    const response: HealthResponse = {
      status,
      timestamp: new Date().toISOString(),
      version: APP_VERSION,
      uptime: process.uptime(),
      store: fastify.fileCenter.storeName,
      dependencies,
    };

    return reply.status(status === 'healthy' ? 200 : 503).send(response);
  });

  done();
};

export const healthRoutesPlugin = fp(healthRoutes, {
  name: 'health-routes',
  fastify: '5.x',
});
