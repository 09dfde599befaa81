// DELETE /files/:token route -- removes a file and its chunks.

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';
import { z } from 'zod';

import { FileNotFoundError } from '../errors/index.js';

interface DeleteParams {
  token: string;
}

const deleteRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  fastify.delete<{ Params: DeleteParams }>(
    '/files/:token',
    {
      schema: {
        description: 'Delete a file by token',
        tags: ['Files'],
        params: z.object({
          token: z.string().describe('Opaque file token returned by POST /files'),
        }),
      },
      config: {
        rateLimit: {
          max: fastify.config.rateLimit.sensitive,
          timeWindow: fastify.config.rateLimit.windowMs,
        },
      },
    },
    async (request, reply) => {
      const id = fastify.fileCenter.decryptIdToken(request.params.token);

      const deleted = await fastify.fileCenter.delete(id);
      if (!deleted) {
        throw new FileNotFoundError();
      }

      request.log.info({ fileId: id.toHexString() }, 'File deleted');
      return reply.status(204).send();
    }
  );

  done();
};

export const deleteRoutesPlugin = fp(deleteRoutes, {
  name: 'delete-routes',
  fastify: '5.x',
});
