// src/core/auth/grants/BaseGrant.ts

import type { GrantKind, GrantSettings, GrantStrategy } from '../types';
import type { TokenSet } from '../../token/types';
import type { TokenEndpoint } from './TokenEndpoint';

export abstract class BaseGrant<S extends GrantSettings = GrantSettings> implements GrantStrategy {
  abstract readonly kind: GrantKind;

  constructor(
    protected settings: S,
    protected endpoint: TokenEndpoint
  ) {}

  abstract acquire(): Promise<TokenSet>;

  /**
   * Refresh is the same for every grant. A rejected refresh token surfaces as
   * ReauthenticationRequiredError from the endpoint and is never retried.
   */
  async refresh(refreshToken: string): Promise<TokenSet> {
    return this.endpoint.request(
      'refresh',
      {
        grant_type: 'refresh_token',
        refresh_token: refreshToken,
        ...this.authorizationDetailsField(),
      },
      refreshToken
    );
  }

  protected scopeField(): Record<string, string> {
    return this.settings.scope ? { scope: this.settings.scope } : {};
  }

  protected authorizationDetailsField(): Record<string, string> {
    const details = this.settings.authorizationDetails;
    return details && details.length > 0
      ? { authorization_details: JSON.stringify(details) }
      : {};
  }
}
