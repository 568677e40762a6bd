// src/core/token/TokenEncryption.ts

import * as crypto from 'crypto';
import { DecryptionError, OAuthConfigError } from '../../utils/errors';

// Fixed salt/info: derivation must be reproducible from the secret alone
const DERIVATION_SALT = 'grantline.token-store.v1';
const DERIVATION_INFO = 'aes-256-gcm';

export class TokenEncryption {
  private key: Buffer;

  constructor(key: Buffer) {
    if (key.length !== 32) {
      throw new OAuthConfigError('Encryption key must be 32 bytes');
    }
    this.key = key;
  }

  static fromHex(hexKey: string): TokenEncryption {
    if (!hexKey || hexKey.length !== 64 || !/^[0-9a-f]{64}$/i.test(hexKey)) {
      throw new OAuthConfigError(
        'Encryption key must be a 32-byte hex string (64 hexadecimal characters)'
      );
    }
    return new TokenEncryption(Buffer.from(hexKey, 'hex'));
  }

  /**
   * HKDF-SHA256 over the client secret. Anyone holding the secret can
   * reproduce the key, so an explicit key should be preferred.
   */
  static fromSecret(secret: string): TokenEncryption {
    if (!secret) {
      throw new OAuthConfigError('Cannot derive an encryption key from an empty secret');
    }
    const derived = crypto.hkdfSync('sha256', secret, DERIVATION_SALT, DERIVATION_INFO, 32);
    return new TokenEncryption(Buffer.from(derived));
  }

  encrypt(plaintext: string): string {
    const iv = crypto.randomBytes(12);
    const cipher = crypto.createCipheriv('aes-256-gcm', this.key, iv);

    let encrypted = cipher.update(plaintext, 'utf8', 'hex');
    encrypted += cipher.final('hex');

    const authTag = cipher.getAuthTag();

    // Format: iv:authTag:ciphertext
    return `${iv.toString('hex')}:${authTag.toString('hex')}:${encrypted}`;
  }

  decrypt(encrypted: string): string {
    const parts = encrypted.split(':');
    if (parts.length !== 3 || parts.some((part) => !/^[0-9a-f]*$/i.test(part))) {
      throw new DecryptionError('Encrypted token state is malformed');
    }

    const [ivHex, tagHex, ciphertext] = parts;
    const iv = Buffer.from(ivHex, 'hex');
    const authTag = Buffer.from(tagHex, 'hex');
    if (iv.length !== 12 || authTag.length !== 16) {
      throw new DecryptionError('Encrypted token state is malformed');
    }

    try {
      const decipher = crypto.createDecipheriv('aes-256-gcm', this.key, iv);
      decipher.setAuthTag(authTag);

      let decrypted = decipher.update(ciphertext, 'hex', 'utf8');
      decrypted += decipher.final('utf8');
      return decrypted;
    } catch (error: unknown) {
      // Wrong key or tampered ciphertext: GCM authentication failed
      throw new DecryptionError('Failed to decrypt token state', {
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
