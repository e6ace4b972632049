import * as crypto from 'node:crypto';
import { CryptoError } from './errors.js';

// -- Constants ---

const CIPHER = 'aes-256-gcm';
const KEY_LENGTH = 32; // bytes
export const NONCE_LENGTH = 12; // bytes (AES-GCM nonce)
export const AUTH_TAG_LENGTH = 16; // bytes (AES-GCM auth tag)

// -- Types ---

/**
 * Output of one AES-256-GCM encryption: ciphertext plus what decryption needs.
 */
export interface SealedChunk {
  readonly nonce: Buffer;
  readonly ciphertext: Buffer;
  readonly tag: Buffer;
}

/**
 * The base64 text forms of a chunk as they appear in an artifact.
 * The integrity tag is computed over these strings.
 */
export interface EncodedChunkFields {
  readonly nonce: string;
  readonly data: string;
  readonly tag: string;
}

// -- CipherEngine ---

/**
 * AES-256-GCM chunk encryption and HMAC-SHA256 chunk-list binding.
 * Keys are raw 32-byte file keys from `generateFileKey`.
 */
export class CipherEngine {
  /**
   * Encrypt one chunk under a fresh random nonce.
   *
   * @throws CryptoError if the key is malformed or the cipher fails
   */
  seal(plaintext: Uint8Array, key: Uint8Array, nonce: Buffer = crypto.randomBytes(NONCE_LENGTH)): SealedChunk {
    assertKey(key);
    if (nonce.length !== NONCE_LENGTH) {
      throw new CryptoError(`nonce must be exactly ${NONCE_LENGTH} bytes`);
    }

    try {
      const cipher = crypto.createCipheriv(CIPHER, key, nonce, { authTagLength: AUTH_TAG_LENGTH });
      const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
      return { nonce, ciphertext, tag: cipher.getAuthTag() };
    } catch (cause) {
      throw new CryptoError('Failed to encrypt chunk', cause);
    }
  }

  /**
   * Decrypt and authenticate one chunk.
   *
   * @throws CryptoError if the tag does not verify (tampering or wrong key)
   */
  open(sealed: SealedChunk, key: Uint8Array): Buffer {
    assertKey(key);
    if (sealed.nonce.length !== NONCE_LENGTH || sealed.tag.length !== AUTH_TAG_LENGTH) {
      throw new CryptoError('Decryption failed: malformed nonce or authentication tag');
    }

    try {
      const decipher = crypto.createDecipheriv(CIPHER, key, sealed.nonce, {
        authTagLength: AUTH_TAG_LENGTH,
      });
      decipher.setAuthTag(sealed.tag);
      return Buffer.concat([decipher.update(sealed.ciphertext), decipher.final()]);
    } catch (cause) {
      throw new CryptoError('Decryption failed: invalid authentication tag or wrong key', cause);
    }
  }

  /**
   * HMAC-SHA256 over nonce∥data∥tag of every chunk, in the given order.
   *
   * @returns base64 digest
   */
  integrityTag(chunks: readonly EncodedChunkFields[], key: Uint8Array): string {
    const hmac = crypto.createHmac('sha256', key);
    for (const chunk of chunks) {
      hmac.update(chunk.nonce + chunk.data + chunk.tag, 'utf-8');
    }
    return hmac.digest('base64');
  }

  /**
   * Constant-time comparison of a recomputed integrity tag with an expected one.
   */
  verifyIntegrity(
    chunks: readonly EncodedChunkFields[],
    key: Uint8Array,
    expected: string,
  ): boolean {
    const computed = Buffer.from(this.integrityTag(chunks, key), 'base64');
    const stored = Buffer.from(expected, 'base64');
    if (computed.length !== stored.length) {
      return false;
    }
    return crypto.timingSafeEqual(computed, stored);
  }
}

// -- Internal Helpers ---

function assertKey(key: Uint8Array): void {
  if (key.length !== KEY_LENGTH) {
    throw new CryptoError(`key must be exactly ${KEY_LENGTH} bytes`);
  }
}
