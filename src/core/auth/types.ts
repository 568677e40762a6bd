// src/core/auth/types.ts

import type { TokenSet } from '../token/types';

export type GrantKind = 'client_credentials' | 'password' | 'authorization_code';

export type ClientAuthMethod = 'client_secret_post' | 'client_secret_basic';

/** Rich Authorization Request (RFC 9396) detail object. */
export interface AuthorizationDetail {
  type: string;
  [key: string]: unknown;
}

/**
 * Flat OAuth2 configuration as callers supply it. The grant is resolved from
 * which fields are present unless `grantType` pins it.
 */
export interface OAuth2Config {
  tokenUrl: string;
  clientId: string;
  clientSecret: string;
  scope?: string;
  authorizationUrl?: string;
  redirectUri?: string;
  username?: string;
  password?: string;
  authorizationDetails?: AuthorizationDetail[];
  encryptionKey?: string;
  grantType?: GrantKind;
  clientAuthMethod?: ClientAuthMethod;
  expirySkewSeconds?: number;
  stateTtlSeconds?: number;
}

interface GrantSettingsBase {
  tokenUrl: string;
  clientId: string;
  clientSecret: string;
  scope: string;
  authorizationDetails?: AuthorizationDetail[];
  clientAuthMethod: ClientAuthMethod;
}

export interface ClientCredentialsSettings extends GrantSettingsBase {
  kind: 'client_credentials';
}

export interface PasswordSettings extends GrantSettingsBase {
  kind: 'password';
  username: string;
  password: string;
}

export interface AuthorizationCodeSettings extends GrantSettingsBase {
  kind: 'authorization_code';
  authorizationUrl: string;
  redirectUri: string;
}

export type GrantSettings = ClientCredentialsSettings | PasswordSettings | AuthorizationCodeSettings;

export type TokenOperation = 'acquire' | 'refresh' | 'exchange';

/** Same acquire/refresh contract for every grant. */
export interface GrantStrategy {
  readonly kind: GrantKind;
  acquire(): Promise<TokenSet>;
  refresh(refreshToken: string): Promise<TokenSet>;
}

export type CoordinatorState =
  | 'unauthenticated'
  | 'acquiring'
  | 'authenticated'
  | 'expired'
  | 'refreshing'
  | 'reauthenticating';

/** Minimal surface the client needs from any auth mechanism. */
export interface AuthProvider {
  getHeader(): Promise<string | undefined>;
  /**
   * Called after a 401 for the header that was sent. Resolves true when a
   * second attempt may succeed.
   */
  invalidate(usedHeader: string | undefined): Promise<boolean>;
}
