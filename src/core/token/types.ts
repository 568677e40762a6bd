// src/core/token/types.ts

export interface TokenSet {
  accessToken: string;
  tokenType: string;
  refreshToken?: string;
  expiresAt?: Date; // absent: treated as non-expiring until a 401 says otherwise
  scope?: string;
}

export interface TokenStoreConfig {
  /** 32-byte key as 64 hex characters. Derived from the client secret when absent. */
  encryptionKey?: string;
  /** Client secret used for key derivation when no explicit key is given. */
  clientSecret?: string;
  expirySkewSeconds?: number;
  namespace?: string;
}

export const DEFAULT_EXPIRY_SKEW_SECONDS = 5;

/**
 * True when the token expires within `skewMs` of `now`. Tokens without an
 * expiry never expire by this check.
 */
export function isTokenExpired(token: TokenSet, skewMs: number, now: number = Date.now()): boolean {
  if (!token.expiresAt) return false;
  return token.expiresAt.getTime() - skewMs <= now;
}
