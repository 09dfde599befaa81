import { toBuffer } from './file-source.js';
import type { FileData } from './types.js';

/**
 * Collect a file payload into one Buffer, draining the stream for chunked
 * files.
 */
export async function readFileData(data: FileData): Promise<Buffer> {
  if (data.kind === 'buffer') {
    return data.buffer;
  }

  const parts: Buffer[] = [];
  for await (const chunk of data.stream) {
    parts.push(toBuffer(chunk));
  }
  return Buffer.concat(parts);
}
