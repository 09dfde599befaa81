import type { FastifyInstance } from 'fastify';

import type { Config } from '@/config/index.js';

export const testConfig: Config = {
  server: { host: '0.0.0.0', port: 0 },
  logging: { level: 'error', pretty: false },
  rateLimit: { global: 1000, windowMs: 60000, sensitive: 100 },
  env: 'test',
  fileCenter: {
    fileSizeThreshold: 10,
    temporaryFileLifetimeSeconds: 1,
    maxFileSize: 64,
    codecKey: 'test-secret-codec-key',
  },
  store: {
    backend: 'memory',
    mongodb: {
      uri: 'mongodb://127.0.0.1:27017',
      database: 'file_center_test',
      serverSelectionTimeoutMs: 5000,
    },
    redis: { host: '127.0.0.1', port: 6379, db: 0, keyPrefix: 'fc-test:' },
  },
};

/** Create multipart form data boundary + body for file upload */
export function createMultipartBody(
  filename: string,
  content: Buffer,
  contentType = 'application/octet-stream'
) {
  const boundary = '----TestBoundary123';
  const body = Buffer.concat([
    Buffer.from(`--${boundary}\r\n`),
    Buffer.from(`Content-Disposition: form-data; name="file"; filename="${filename}"\r\n`),
    Buffer.from(`Content-Type: ${contentType}\r\n\r\n`),
    content,
    Buffer.from(`\r\n--${boundary}--\r\n`),
  ]);
  return { body, boundary };
}

/** POST a file and return its token */
export async function uploadFile(
  server: FastifyInstance,
  filename: string,
  content: string,
  options: { temporary?: boolean; contentType?: string } = {}
): Promise<string> {
  const { body, boundary } = createMultipartBody(
    filename,
    Buffer.from(content),
    options.contentType
  );

  const response = await server.inject({
    method: 'POST',
    url: options.temporary ? '/files?temporary=true' : '/files',
    headers: { 'content-type': `multipart/form-data; boundary=${boundary}` },
    payload: body,
  });
  if (response.statusCode !== 200) {
    throw new Error(`Upload failed with ${response.statusCode}: ${response.body}`);
  }
  return (response.json() as { token: string }).token;
}
