// Content fingerprints used as the deduplication key for perennial files.
//
// SHA3-256 over the raw bytes, hex encoded. Feeding the same bytes in one
// buffer or split across many chunks yields the same digest.

import { createHash, type Hash } from 'node:crypto';

export const CONTENT_HASH_ALGORITHM = 'sha3-256';

/**
 * Incremental digest that can sit in the middle of a byte stream, so a
 * single-pass source is hashed while it is being written.
 */
export class ContentDigest {
  private readonly hash: Hash = createHash(CONTENT_HASH_ALGORITHM);
  private result: string | null = null;

  update(bytes: Uint8Array): void {
    if (this.result !== null) {
      throw new Error('Content digest already finalized');
    }
    this.hash.update(bytes);
  }

  /** Pass chunks through unchanged while feeding them to the digest. */
  async *tap(source: AsyncIterable<Buffer>): AsyncGenerator<Buffer> {
    for await (const chunk of source) {
      this.update(chunk);
      yield chunk;
    }
  }

  digest(): string {
    if (this.result === null) {
      this.result = this.hash.digest('hex');
    }
    return this.result;
  }
}

/**
 * Hash a whole byte sequence, buffered or streamed.
 */
export async function hashContent(source: Uint8Array | AsyncIterable<Uint8Array>): Promise<string> {
  const digest = new ContentDigest();

  if (source instanceof Uint8Array) {
    digest.update(source);
    return digest.digest();
  }

  for await (const chunk of source) {
    digest.update(chunk);
  }
  return digest.digest();
}
