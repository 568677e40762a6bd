// src/core/token/EncryptedTokenStore.ts

import Keyv from 'keyv';
import PQueue from 'p-queue';
import { z } from 'zod';
import type { TokenSet, TokenStoreConfig } from './types';
import { DEFAULT_EXPIRY_SKEW_SECONDS, isTokenExpired } from './types';
import { TokenEncryption } from './TokenEncryption';
import type { Logger } from '../../observability/Logger';
import { DecryptionError, OAuthConfigError, TokenError } from '../../utils/errors';

const TOKEN_KEY = 'token';

const SerializedTokenSchema = z.object({
  accessToken: z.string().min(1),
  tokenType: z.string(),
  refreshToken: z.string().optional(),
  expiresAt: z.string().datetime().optional(),
  scope: z.string().optional(),
});

type SerializedToken = z.infer<typeof SerializedTokenSchema>;

/**
 * Holds exactly one TokenSet as AES-256-GCM ciphertext in memory. Plaintext
 * exists only inside a queued read or write; operations run one at a time.
 */
export class EncryptedTokenStore {
  private store: Keyv<string>;
  private encryption: TokenEncryption;
  private lock = new PQueue({ concurrency: 1 });
  private logger: Logger;
  private skewMs: number;

  constructor(config: TokenStoreConfig, logger: Logger) {
    this.logger = logger;
    this.skewMs = (config.expirySkewSeconds ?? DEFAULT_EXPIRY_SKEW_SECONDS) * 1000;
    this.store = new Keyv<string>({ namespace: config.namespace ?? 'grantline' });

    if (config.encryptionKey) {
      this.encryption = TokenEncryption.fromHex(config.encryptionKey);
    } else if (config.clientSecret) {
      this.logger.warn('No encryption key configured, deriving one from the client secret', {
        recommendation: 'Set an explicit 32-byte encryptionKey in production',
      });
      this.encryption = TokenEncryption.fromSecret(config.clientSecret);
    } else {
      throw new OAuthConfigError('Token store needs an encryptionKey or a clientSecret');
    }
  }

  get expirySkewMs(): number {
    return this.skewMs;
  }

  /** Replace the stored token entirely. */
  async write(token: TokenSet): Promise<void> {
    if (!token.accessToken) {
      throw new TokenError('Refusing to store a token without an access token');
    }

    await this.lock.add(
      async () => {
        const ciphertext = this.encryption.encrypt(JSON.stringify(this.serialize(token)));
        await this.store.set(TOKEN_KEY, ciphertext);
      },
      { throwOnTimeout: true }
    );

    this.logger.debug('Token stored', { hasRefreshToken: token.refreshToken !== undefined });
  }

  /**
   * @throws {DecryptionError} If the ciphertext is corrupt, was written under
   * another key, or decrypts to something that is not a token
   */
  async read(): Promise<TokenSet | null> {
    return this.lock.add(
      async () => {
        const ciphertext = await this.store.get(TOKEN_KEY);
        if (ciphertext === undefined) return null;
        return this.deserialize(this.encryption.decrypt(ciphertext));
      },
      { throwOnTimeout: true }
    );
  }

  /** An empty store counts as expired. */
  async isExpired(skewMs: number = this.skewMs): Promise<boolean> {
    const token = await this.read();
    return token === null || isTokenExpired(token, skewMs);
  }

  async clear(): Promise<void> {
    await this.lock.add(
      async () => {
        await this.store.delete(TOKEN_KEY);
      },
      { throwOnTimeout: true }
    );
    this.logger.debug('Token cleared');
  }

  private serialize(token: TokenSet): SerializedToken {
    return {
      accessToken: token.accessToken,
      tokenType: token.tokenType,
      ...(token.refreshToken !== undefined ? { refreshToken: token.refreshToken } : {}),
      ...(token.expiresAt !== undefined ? { expiresAt: token.expiresAt.toISOString() } : {}),
      ...(token.scope !== undefined ? { scope: token.scope } : {}),
    };
  }

  private deserialize(plaintext: string): TokenSet {
    let raw: unknown;
    try {
      raw = JSON.parse(plaintext);
    } catch {
      throw new DecryptionError('Decrypted token state is not valid JSON');
    }

    const parsed = SerializedTokenSchema.safeParse(raw);
    if (!parsed.success) {
      throw new DecryptionError('Decrypted token state has an unexpected shape', {
        issues: parsed.error.issues.map((issue) => issue.path.join('.')),
      });
    }

    const { expiresAt, ...rest } = parsed.data;
    return {
      ...rest,
      ...(expiresAt !== undefined ? { expiresAt: new Date(expiresAt) } : {}),
    };
  }
}
