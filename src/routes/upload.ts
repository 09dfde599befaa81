// POST /files route -- stores an uploaded file and returns its token.
//
// The multipart file stream goes straight into the file center, so large
// uploads are chunked into the store without being buffered in full.

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';
import type { ObjectId } from 'mongodb';
import { z } from 'zod';

// Also brings in the type augmentation that adds request.file() to FastifyRequest
import type { MultipartFile } from '@fastify/multipart';

import { FileRequiredError, PayloadTooLargeError } from '../errors/index.js';
import { fromStream, toBuffer } from '../file-center/file-source.js';

interface UploadQuerystring {
  temporary: 'true' | 'false';
}

/**
 * Busboy stops at the size limit and ends the stream quietly, marking it
 * truncated. Fail the read instead so the partial upload is never committed.
 */
async function* untruncated(file: MultipartFile['file'], limit: number): AsyncGenerator<Buffer> {
  for await (const chunk of file) {
    yield toBuffer(chunk);
  }
  if (file.truncated) {
    throw new PayloadTooLargeError(limit);
  }
}

const uploadRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  const { maxFileSize } = fastify.config.fileCenter;

  fastify.post<{ Querystring: UploadQuerystring }>(
    '/files',
    {
      schema: {
        description:
          'Upload a file (multipart/form-data, field "file"). Temporary files can be downloaded once.',
        tags: ['Files'],
        querystring: z.object({
          temporary: z
            .enum(['true', 'false'])
            .default('false')
            .describe('Store as a single-use temporary file'),
        }),
        response: {
          200: z.object({
            success: z.literal(true),
            token: z.string(),
            temporary: z.boolean(),
          }),
        },
      },
      config: {
        rateLimit: {
          max: fastify.config.rateLimit.sensitive,
          timeWindow: fastify.config.rateLimit.windowMs,
        },
      },
    },
    async (request, reply) => {
      const temporary = request.query.temporary === 'true';

      const data = await request.file({ limits: { fileSize: maxFileSize, files: 1 } });
      if (!data) {
        throw new FileRequiredError();
      }

      let id: ObjectId;
      try {
        id = await fastify.fileCenter.put(fromStream(untruncated(data.file, maxFileSize)), {
          ...(data.filename && { fileName: data.filename }),
          ...(data.mimetype && { mimeType: data.mimetype }),
          temporary,
        });
      } catch (error) {
        if (error instanceof fastify.multipartErrors.RequestFileTooLargeError) {
          throw new PayloadTooLargeError(maxFileSize);
        }
        throw error;
      }

      const token = fastify.fileCenter.encryptId(id);
      request.log.info({ fileId: id.toHexString(), temporary }, 'File stored');

      return reply.status(200).send({ success: true, token, temporary });
    }
  );

  done();
};

export const uploadRoutesPlugin = fp(uploadRoutes, {
  name: 'upload-routes',
  fastify: '5.x',
});
