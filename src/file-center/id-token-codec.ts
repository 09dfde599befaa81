// Opaque, URL-safe tokens for file identifiers.
//
// Deterministic authenticated encryption in the SIV style: a keyed HMAC over
// the 12 id bytes is both the integrity tag and the AES-CTR IV. The same id
// always maps to the same token, and any token not produced with the current
// key fails the tag check.
//
// Token layout (base64url, no padding, 38 chars): tag(16) || ciphertext(12)

import {
  createCipheriv,
  createDecipheriv,
  createHmac,
  hkdfSync,
  timingSafeEqual,
} from 'node:crypto';

import { ObjectId } from 'mongodb';

import { InvalidTokenError } from './errors.js';

const ID_LENGTH = 12;
const TAG_LENGTH = 16;
const TOKEN_LENGTH = Math.ceil(((ID_LENGTH + TAG_LENGTH) * 8) / 6);
const TOKEN_PATTERN = new RegExp(`^[A-Za-z0-9_-]{${TOKEN_LENGTH}}$`);

const KDF_SALT = 'file-center/id-token';

export class IdTokenCodec {
  private readonly encryptionKey: Buffer;
  private readonly macKey: Buffer;

  /**
   * @param secret - process-wide codec key. Changing it invalidates every
   *   token issued under the previous key.
   */
  constructor(secret: string) {
    if (secret.length === 0) {
      throw new Error('ID token codec key must not be empty');
    }
    this.encryptionKey = Buffer.from(hkdfSync('sha256', secret, KDF_SALT, 'encryption', 32));
    this.macKey = Buffer.from(hkdfSync('sha256', secret, KDF_SALT, 'authentication', 32));
  }

  encrypt(id: ObjectId): string {
    const raw = Buffer.from(id.toHexString(), 'hex');
    const tag = this.tagFor(raw);

    const cipher = createCipheriv('aes-256-ctr', this.encryptionKey, tag);
    const body = Buffer.concat([cipher.update(raw), cipher.final()]);

    return Buffer.concat([tag, body]).toString('base64url');
  }

  /**
   * Recover the id behind a token.
   *
   * Every failure (bad characters, wrong length, non-canonical encoding,
   * foreign key, tampering) throws the same InvalidTokenError.
   */
  decrypt(token: string): ObjectId {
    if (!TOKEN_PATTERN.test(token)) {
      throw new InvalidTokenError();
    }

    const bytes = Buffer.from(token, 'base64url');
    if (bytes.length !== TAG_LENGTH + ID_LENGTH || bytes.toString('base64url') !== token) {
      throw new InvalidTokenError();
    }

    const tag = bytes.subarray(0, TAG_LENGTH);
    const decipher = createDecipheriv('aes-256-ctr', this.encryptionKey, tag);
    const raw = Buffer.concat([decipher.update(bytes.subarray(TAG_LENGTH)), decipher.final()]);

    if (!timingSafeEqual(tag, this.tagFor(raw))) {
      throw new InvalidTokenError();
    }

    return new ObjectId(raw.toString('hex'));
  }

  private tagFor(raw: Buffer): Buffer {
    return createHmac('sha256', this.macKey).update(raw).digest().subarray(0, TAG_LENGTH);
  }
}
