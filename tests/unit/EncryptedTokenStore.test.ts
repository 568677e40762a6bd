// tests/unit/EncryptedTokenStore.test.ts

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { EncryptedTokenStore } from '../../src/core/token/EncryptedTokenStore';
import { TokenEncryption } from '../../src/core/token/TokenEncryption';
import { Logger } from '../../src/observability/Logger';
import { DecryptionError, OAuthConfigError, TokenError } from '../../src/utils/errors';
import type { TokenSet } from '../../src/core/token/types';
import { TEST_ENCRYPTION_KEY } from '../helpers/testDeps';

describe('EncryptedTokenStore', () => {
  let logger: Logger;
  let store: EncryptedTokenStore;

  const token: TokenSet = {
    accessToken: 'at-1',
    tokenType: 'Bearer',
    refreshToken: 'rt-1',
    expiresAt: new Date('2026-01-01T01:00:00.000Z'),
    scope: 'read write',
  };

  beforeEach(() => {
    logger = new Logger({ silent: true });
    store = new EncryptedTokenStore({ encryptionKey: TEST_ENCRYPTION_KEY }, logger);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should return null when empty', async () => {
    expect(await store.read()).toBeNull();
  });

  it('should round-trip a token', async () => {
    await store.write(token);

    expect(await store.read()).toEqual(token);
  });

  it('should round-trip a token without optional fields', async () => {
    const minimal: TokenSet = { accessToken: 'at-2', tokenType: 'Bearer' };

    await store.write(minimal);

    expect(await store.read()).toEqual(minimal);
  });

  it('should replace the previous token entirely', async () => {
    await store.write(token);
    await store.write({ accessToken: 'at-2', tokenType: 'Bearer' });

    expect(await store.read()).toEqual({ accessToken: 'at-2', tokenType: 'Bearer' });
  });

  it('should keep only ciphertext in the backing store', async () => {
    await store.write(token);

    const raw = await store['store'].get('token');

    expect(raw).toBeDefined();
    expect(raw).not.toContain('at-1');
    expect(raw).not.toContain('rt-1');
  });

  it('should refuse a token without an access token', async () => {
    await expect(store.write({ accessToken: '', tokenType: 'Bearer' })).rejects.toBeInstanceOf(
      TokenError
    );
  });

  it('should clear the token', async () => {
    await store.write(token);
    await store.clear();

    expect(await store.read()).toBeNull();
  });

  it('should raise DecryptionError for corrupt ciphertext', async () => {
    await store['store'].set('token', 'garbage');

    await expect(store.read()).rejects.toBeInstanceOf(DecryptionError);
  });

  it('should raise DecryptionError for plaintext that is not a token', async () => {
    const encryption = TokenEncryption.fromHex(TEST_ENCRYPTION_KEY);
    await store['store'].set('token', encryption.encrypt(JSON.stringify({ foo: 'bar' })));

    await expect(store.read()).rejects.toThrow('Decrypted token state has an unexpected shape');
  });

  it('should not read a token written under another key', async () => {
    const other = new EncryptedTokenStore({ encryptionKey: 'b'.repeat(64) }, logger);
    await store.write(token);
    const ciphertext = await store['store'].get('token');
    await other['store'].set('token', ciphertext ?? '');

    await expect(other.read()).rejects.toBeInstanceOf(DecryptionError);
  });

  describe('key selection', () => {
    it('should derive a key from the client secret and warn', () => {
      const warn = vi.spyOn(logger, 'warn');

      new EncryptedTokenStore({ clientSecret: 'test-secret' }, logger);

      expect(warn).toHaveBeenCalledWith(
        'No encryption key configured, deriving one from the client secret',
        { recommendation: 'Set an explicit 32-byte encryptionKey in production' }
      );
    });

    it('should require a key or a secret', () => {
      expect(() => new EncryptedTokenStore({}, logger)).toThrow(OAuthConfigError);
    });
  });

  describe('isExpired', () => {
    beforeEach(() => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(new Date('2026-01-01T00:00:00.000Z'));
    });

    it('should treat an empty store as expired', async () => {
      expect(await store.isExpired()).toBe(true);
    });

    it('should not expire a token without expiresAt', async () => {
      await store.write({ accessToken: 'at-1', tokenType: 'Bearer' });

      expect(await store.isExpired()).toBe(false);
    });

    it('should expire within the skew window', async () => {
      await store.write({
        accessToken: 'at-1',
        tokenType: 'Bearer',
        expiresAt: new Date('2026-01-01T00:00:04.000Z'),
      });

      expect(await store.isExpired()).toBe(true);
      expect(await store.isExpired(1000)).toBe(false);
    });

    it('should not expire a token outside the skew window', async () => {
      await store.write(token);

      expect(await store.isExpired()).toBe(false);
    });
  });
});
