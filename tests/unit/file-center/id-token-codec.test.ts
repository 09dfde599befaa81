import { ObjectId } from 'mongodb';
import { describe, it, expect } from 'vitest';

import { IdTokenCodec } from '@/file-center/id-token-codec.js';

const BASE64URL_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789-_';

function expectInvalidToken(fn: () => unknown): void {
  try {
    fn();
    expect.fail('Expected error to be thrown');
  } catch (error) {
    expect((error as { code: string }).code).toBe('INVALID_TOKEN');
    expect((error as Error).message).toBe('Invalid file token');
  }
}

describe('IdTokenCodec', () => {
  const codec = new IdTokenCodec('test-secret-codec-key');
  const id = new ObjectId('65f1a2b3c4d5e6f708192a3b');

  it('should round-trip an id', () => {
    const token = codec.encrypt(id);
    expect(codec.decrypt(token).equals(id)).toBe(true);
  });

  it('should round-trip freshly generated ids', () => {
    for (let i = 0; i < 20; i++) {
      const fresh = new ObjectId();
      expect(codec.decrypt(codec.encrypt(fresh)).toHexString()).toBe(fresh.toHexString());
    }
  });

  it('should be deterministic for the same id and key', () => {
    expect(codec.encrypt(id)).toBe(codec.encrypt(id));
    expect(new IdTokenCodec('test-secret-codec-key').encrypt(id)).toBe(codec.encrypt(id));
  });

  it('should produce a 38-character URL-safe token', () => {
    expect(codec.encrypt(id)).toMatch(/^[A-Za-z0-9_-]{38}$/);
  });

  it('should not expose the id bytes in the token', () => {
    const decoded = Buffer.from(codec.encrypt(id), 'base64url').toString('hex');
    expect(decoded).not.toContain(id.toHexString());
  });

  it('should give different tokens for different ids', () => {
    const other = new ObjectId('65f1a2b3c4d5e6f708192a3c');
    expect(codec.encrypt(other)).not.toBe(codec.encrypt(id));
  });

  it('should reject tokens issued under another key', () => {
    const foreign = new IdTokenCodec('another-test-secret').encrypt(id);
    expectInvalidToken(() => codec.decrypt(foreign));
  });

  it('should reject a token with one character changed', () => {
    const token = codec.encrypt(id);
    const first = token[0] === 'A' ? 'B' : 'A';
    expectInvalidToken(() => codec.decrypt(first + token.slice(1)));
  });

  it('should reject a non-canonical encoding of a valid token', () => {
    const token = codec.encrypt(id);
    const last = BASE64URL_ALPHABET.indexOf(token[token.length - 1]);
    const variant = token.slice(0, -1) + BASE64URL_ALPHABET[last ^ 1];

    expect(Buffer.from(variant, 'base64url').equals(Buffer.from(token, 'base64url'))).toBe(true);
    expectInvalidToken(() => codec.decrypt(variant));
  });

  it('should reject malformed tokens with the same error', () => {
    const token = codec.encrypt(id);
    expectInvalidToken(() => codec.decrypt(''));
    expectInvalidToken(() => codec.decrypt(token.slice(0, -1)));
    expectInvalidToken(() => codec.decrypt(token + 'A'));
    expectInvalidToken(() => codec.decrypt(token.slice(0, -1) + '!'));
    expectInvalidToken(() => codec.decrypt(id.toHexString()));
  });

  it('should refuse an empty key', () => {
    expect(() => new IdTokenCodec('')).toThrow('ID token codec key must not be empty');
  });
});
