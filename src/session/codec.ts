import { createCipheriv, createDecipheriv, type CipherGCMTypes } from 'crypto';
import { DecodeError, InvalidKeyError, InvalidSessionError } from '../errors';
import { secureRandom, type RandomSource } from '../utils/random';

export const NONCE_SIZE = 12;
export const TAG_SIZE = 16;

const CIPHERS: Record<number, CipherGCMTypes> = {
  16: 'aes-128-gcm',
  24: 'aes-192-gcm',
  32: 'aes-256-gcm'
};

const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})*$/;

export interface SessionCodecOptions {
  nonceSource?: RandomSource;
}

/**
 * AES-GCM codec for session state stored in a client cookie.
 *
 * Wire layout is `nonce(12) ‖ ciphertext ‖ tag(16)`, hex encoded for the
 * cookie. Every failure past hex decoding surfaces as InvalidSessionError.
 */
export class SessionCodec {
  private key: Buffer;
  private algorithm: CipherGCMTypes;
  private nonceSource: RandomSource;

  constructor(key: Buffer | string, options: SessionCodecOptions = {}) {
    this.key = typeof key === 'string' ? Buffer.from(key, 'utf8') : Buffer.from(key);
    const algorithm = CIPHERS[this.key.length];
    if (!algorithm) {
      throw new InvalidKeyError(this.key.length);
    }
    this.algorithm = algorithm;
    this.nonceSource = options.nonceSource ?? secureRandom;
  }

  encrypt(plaintext: Buffer): Buffer {
    const nonce = this.nonceSource(NONCE_SIZE);
    if (nonce.length !== NONCE_SIZE) {
      throw new RangeError(`nonce source returned ${nonce.length} bytes, expected ${NONCE_SIZE}`);
    }
    const cipher = createCipheriv(this.algorithm, this.key, nonce, { authTagLength: TAG_SIZE });
    const sealed = Buffer.concat([cipher.update(plaintext), cipher.final()]);

    return Buffer.concat([nonce, sealed, cipher.getAuthTag()]);
  }

  decrypt(data: Buffer): Buffer {
    if (data.length < NONCE_SIZE + TAG_SIZE) {
      throw new InvalidSessionError();
    }
    const nonce = data.subarray(0, NONCE_SIZE);
    const sealed = data.subarray(NONCE_SIZE, data.length - TAG_SIZE);
    const tag = data.subarray(data.length - TAG_SIZE);

    try {
      const decipher = createDecipheriv(this.algorithm, this.key, nonce, { authTagLength: TAG_SIZE });
      decipher.setAuthTag(tag);
      return Buffer.concat([decipher.update(sealed), decipher.final()]);
    } catch {
      throw new InvalidSessionError();
    }
  }

  encodeText(plaintext: string): string {
    return this.encrypt(Buffer.from(plaintext, 'utf8')).toString('hex');
  }

  decodeText(state: string): string {
    if (!HEX_PATTERN.test(state)) {
      throw new DecodeError();
    }

    return this.decrypt(Buffer.from(state, 'hex')).toString('utf8');
  }
}

export function encodeText(plaintext: string, key: Buffer | string): string {
  return new SessionCodec(key).encodeText(plaintext);
}

export function decodeText(state: string, key: Buffer | string): string {
  return new SessionCodec(key).decodeText(state);
}
