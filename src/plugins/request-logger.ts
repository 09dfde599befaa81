import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';

interface RequestLoggerOptions {
  isDev: boolean;
}

const requestLogger: FastifyPluginCallback<RequestLoggerOptions> = (fastify, options, done) => {
  const { isDev } = options;

  // Log incoming requests. File tokens are opaque, so URLs are safe to log.
  fastify.addHook('onRequest', async (request) => {
    const logData: Record<string, unknown> = {
      method: request.method,
      url: request.url,
      requestId: request.id,
      userAgent: request.headers['user-agent'],
      contentLength: request.headers['content-length'],
    };

    // Upload bodies are streamed, never logged; dev gets the multipart boundary header
    if (isDev) {
      logData.contentType = request.headers['content-type'];
    }

    request.log.info(logData, 'Incoming request');
  });

  // Log completed responses
  fastify.addHook('onResponse', async (request, reply) => {
    const logData: Record<string, unknown> = {
      method: request.method,
      url: request.url,
      statusCode: reply.statusCode,
      responseTime: reply.elapsedTime,
      requestId: request.id,
      bytesSent: reply.getHeader('content-length'),
    };

    // Log at appropriate level based on status code
    if (reply.statusCode >= 500) {
      request.log.error(logData, 'Request completed with server error');
    } else if (reply.statusCode >= 400) {
      request.log.warn(logData, 'Request completed with client error');
    } else {
      request.log.info(logData, 'Request completed');
    }
  });

  done();
};

export const requestLoggerPlugin = fp(requestLogger, {
  name: 'request-logger',
  fastify: '5.x',
});
