// tests/unit/TokenEncryption.test.ts

import { describe, it, expect } from 'vitest';
import * as crypto from 'crypto';
import { TokenEncryption } from '../../src/core/token/TokenEncryption';
import { DecryptionError, OAuthConfigError } from '../../src/utils/errors';

describe('TokenEncryption', () => {
  const testKey = crypto.randomBytes(32).toString('hex');

  it('should reject keys that are not 32 bytes of hex', () => {
    expect(() => TokenEncryption.fromHex('abc')).toThrow(OAuthConfigError);
    expect(() => TokenEncryption.fromHex('')).toThrow('32-byte hex string');
    expect(() => TokenEncryption.fromHex('z'.repeat(64))).toThrow('32-byte hex string');
    expect(() => TokenEncryption.fromHex('a'.repeat(63))).toThrow('32-byte hex string');
    expect(() => TokenEncryption.fromHex('a'.repeat(65))).toThrow('32-byte hex string');
    expect(() => new TokenEncryption(Buffer.alloc(16))).toThrow('Encryption key must be 32 bytes');

    expect(() => TokenEncryption.fromHex('a'.repeat(64))).not.toThrow();
  });

  it('should encrypt and decrypt data correctly', () => {
    const encryption = TokenEncryption.fromHex(testKey);
    const plaintext = 'sensitive token data';

    const encrypted = encryption.encrypt(plaintext);

    expect(encrypted).not.toContain(plaintext);
    expect(encrypted.split(':')).toHaveLength(3); // iv:authTag:ciphertext
    expect(encryption.decrypt(encrypted)).toBe(plaintext);
  });

  it('should produce different ciphertexts for same plaintext', () => {
    const encryption = TokenEncryption.fromHex(testKey);

    const encrypted1 = encryption.encrypt('same data');
    const encrypted2 = encryption.encrypt('same data');

    expect(encrypted1).not.toBe(encrypted2);
    expect(encryption.decrypt(encrypted1)).toBe('same data');
    expect(encryption.decrypt(encrypted2)).toBe('same data');
  });

  it('should fail to decrypt with wrong key', () => {
    const encryption1 = TokenEncryption.fromHex(testKey);
    const encryption2 = TokenEncryption.fromHex(crypto.randomBytes(32).toString('hex'));

    const encrypted = encryption1.encrypt('secret');

    expect(() => encryption2.decrypt(encrypted)).toThrow(DecryptionError);
  });

  it('should detect tampered ciphertext', () => {
    const encryption = TokenEncryption.fromHex(testKey);
    const [iv, tag, ciphertext] = encryption.encrypt('secret value').split(':');
    const flipped = (ciphertext[0] === '0' ? '1' : '0') + ciphertext.slice(1);

    expect(() => encryption.decrypt(`${iv}:${tag}:${flipped}`)).toThrow('Failed to decrypt token state');
  });

  it('should reject malformed input', () => {
    const encryption = TokenEncryption.fromHex(testKey);

    expect(() => encryption.decrypt('not-encrypted')).toThrow('Encrypted token state is malformed');
    expect(() => encryption.decrypt('zz:zz:zz')).toThrow('Encrypted token state is malformed');
    expect(() => encryption.decrypt('00:00:00')).toThrow('Encrypted token state is malformed');
  });

  it('should derive the same key from the same secret', () => {
    const first = TokenEncryption.fromSecret('test-secret');
    const second = TokenEncryption.fromSecret('test-secret');
    const other = TokenEncryption.fromSecret('other-secret');

    const encrypted = first.encrypt('payload');

    expect(second.decrypt(encrypted)).toBe('payload');
    expect(() => other.decrypt(encrypted)).toThrow(DecryptionError);
    expect(() => TokenEncryption.fromSecret('')).toThrow(OAuthConfigError);
  });
});
