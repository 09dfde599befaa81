// GET /files/:token route -- serves a stored file.
//
// Inline files are sent as a buffer, chunked files are streamed chunk by
// chunk. A temporary file answers once; afterwards it is 404 like any
// unknown token.

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';
import { z } from 'zod';

import { FileNotFoundError } from '../errors/index.js';
import { DEFAULT_MIME_TYPE } from '../file-center/types.js';

interface DownloadParams {
  token: string;
}

/** RFC 6266 `filename*` form, so any UTF-8 name survives the header */
function contentDisposition(fileName: string): string {
  const fallback = fileName.replace(/[^\x20-\x7e]|["\\]/g, '_');
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encodeURIComponent(fileName)}`;
}

const downloadRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  fastify.get<{ Params: DownloadParams }>(
    '/files/:token',
    {
      schema: {
        description: 'Download a file by token',
        tags: ['Files'],
        params: z.object({
          token: z.string().describe('Opaque file token returned by POST /files'),
        }),
      },
    },
    async (request, reply) => {
      const id = fastify.fileCenter.decryptIdToken(request.params.token);

      const item = await fastify.fileCenter.get(id);
      if (!item) {
        throw new FileNotFoundError();
      }

      void reply
        .status(200)
        .header('Content-Type', item.mimeType ?? DEFAULT_MIME_TYPE)
        .header('Content-Length', item.size.toString());
      if (item.fileName) {
        void reply.header('Content-Disposition', contentDisposition(item.fileName));
      }

      return reply.send(item.data.kind === 'buffer' ? item.data.buffer : item.data.stream);
    }
  );

  done();
};

export const downloadRoutesPlugin = fp(downloadRoutes, {
  name: 'download-routes',
  fastify: '5.x',
});
