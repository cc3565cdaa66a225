/**
 * credentialCipher.ts — Encrypt/decrypt capability for stored passwords.
 *
 * The engine only ever calls `decrypt()`, and only from the Session Manager.
 * Handles produced by `AesGcmCipher` look like `<iv>.<tag>.<ciphertext>`,
 * each part base64url-encoded.
 */

import { createCipheriv, createDecipheriv, randomBytes } from 'crypto';

export interface CredentialCipher {
  encrypt(plaintext: string): string;
  /** Throws when the handle was not produced with this key. */
  decrypt(handle: string): string;
}

const IV_BYTES = 12;

export class AesGcmCipher implements CredentialCipher {
  private readonly key: Buffer;

  /**
   * @param base64Key - 32 random bytes, base64-encoded (ENCRYPTION_KEY).
   */
  constructor(base64Key: string) {
    const key = Buffer.from(base64Key, 'base64');
    if (key.length !== 32) {
      throw new Error(
        `AesGcmCipher: ENCRYPTION_KEY must decode to 32 bytes (got ${key.length}).`,
      );
    }
    this.key = key;
  }

  /** Convenience for the CLI: build from config, failing loudly when unset. */
  static fromKey(base64Key: string | undefined): AesGcmCipher {
    if (!base64Key) {
      throw new Error(
        'AesGcmCipher: ENCRYPTION_KEY must be set in the environment.',
      );
    }
    return new AesGcmCipher(base64Key);
  }

  encrypt(plaintext: string): string {
    const iv = randomBytes(IV_BYTES);
    const cipher = createCipheriv('aes-256-gcm', this.key, iv);
    const ciphertext = Buffer.concat([
      cipher.update(plaintext, 'utf8'),
      cipher.final(),
    ]);
    const tag = cipher.getAuthTag();
    return [iv, tag, ciphertext].map((b) => b.toString('base64url')).join('.');
  }

  decrypt(handle: string): string {
    const parts = handle.split('.');
    if (parts.length !== 3) {
      throw new Error('Malformed credential handle');
    }
    const [iv, tag, ciphertext] = parts.map((p) => Buffer.from(p, 'base64url'));

    const decipher = createDecipheriv('aes-256-gcm', this.key, iv);
    decipher.setAuthTag(tag);
    return Buffer.concat([
      decipher.update(ciphertext),
      decipher.final(),
    ]).toString('utf8');
  }
}
