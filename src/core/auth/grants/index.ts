// src/core/auth/grants/index.ts

import type {
  ClientCredentialsSettings,
  GrantSettings,
  GrantStrategy,
  OAuth2Config,
} from '../types';
import type { TokenEndpoint } from './TokenEndpoint';
import type { CsrfStateGuard } from '../CsrfStateGuard';
import type { Logger } from '../../../observability/Logger';
import { ClientCredentialsGrant } from './ClientCredentialsGrant';
import { PasswordGrant } from './PasswordGrant';
import { AuthorizationCodeGrant } from './AuthorizationCodeGrant';
import { OAuthConfigError } from '../../../utils/errors';

export { TokenEndpoint, parseTokenResponse, extractOAuthError } from './TokenEndpoint';
export { ClientCredentialsGrant, PasswordGrant, AuthorizationCodeGrant };
export type { VerifiedCallback } from './AuthorizationCodeGrant';

/**
 * Resolve which grant a flat config describes. An explicit `grantType` wins;
 * otherwise authorization code, then password, then client credentials.
 *
 * @throws {OAuthConfigError} If the chosen grant is missing its fields
 */
export function resolveGrantSettings(config: OAuth2Config): GrantSettings {
  const base: Omit<ClientCredentialsSettings, 'kind'> = {
    tokenUrl: config.tokenUrl,
    clientId: config.clientId,
    clientSecret: config.clientSecret,
    scope: config.scope ?? '',
    clientAuthMethod: config.clientAuthMethod ?? 'client_secret_post',
    ...(config.authorizationDetails && config.authorizationDetails.length > 0
      ? { authorizationDetails: config.authorizationDetails }
      : {}),
  };

  const kind =
    config.grantType ??
    (config.authorizationUrl
      ? 'authorization_code'
      : config.username && config.password
        ? 'password'
        : 'client_credentials');

  switch (kind) {
    case 'authorization_code':
      if (!config.authorizationUrl || !config.redirectUri) {
        throw new OAuthConfigError('Authorization code grant needs authorizationUrl and redirectUri');
      }
      return {
        ...base,
        kind,
        authorizationUrl: config.authorizationUrl,
        redirectUri: config.redirectUri,
      };

    case 'password':
      if (!config.username || !config.password) {
        throw new OAuthConfigError('Password grant needs username and password');
      }
      return { ...base, kind, username: config.username, password: config.password };

    case 'client_credentials':
      return { ...base, kind };
  }
}

export function createGrantStrategy(
  settings: GrantSettings,
  endpoint: TokenEndpoint,
  stateGuard: CsrfStateGuard,
  logger: Logger
): GrantStrategy {
  switch (settings.kind) {
    case 'authorization_code':
      return new AuthorizationCodeGrant(settings, endpoint, stateGuard, logger);
    case 'password':
      return new PasswordGrant(settings, endpoint);
    case 'client_credentials':
      return new ClientCredentialsGrant(settings, endpoint);
  }
}
