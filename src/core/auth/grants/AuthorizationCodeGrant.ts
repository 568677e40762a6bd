// src/core/auth/grants/AuthorizationCodeGrant.ts

import { Issuer } from 'openid-client';
import type { Client } from 'openid-client';
import type { AuthorizationCodeSettings } from '../types';
import type { TokenSet } from '../../token/types';
import type { TokenEndpoint } from './TokenEndpoint';
import type { CsrfStateGuard } from '../CsrfStateGuard';
import type { Logger } from '../../../observability/Logger';
import { BaseGrant } from './BaseGrant';
import {
  AuthorizationResponseError,
  OAuthDeniedError,
  ReauthenticationRequiredError,
} from '../../../utils/errors';

/** A callback whose state has been validated and consumed. */
export interface VerifiedCallback {
  code: string;
}

/**
 * Two-phase grant. The redirect URL is built locally; the code exchange only
 * happens after the callback's state has been checked against the guard.
 */
export class AuthorizationCodeGrant extends BaseGrant<AuthorizationCodeSettings> {
  readonly kind = 'authorization_code';
  private client: Client;

  constructor(
    settings: AuthorizationCodeSettings,
    endpoint: TokenEndpoint,
    private stateGuard: CsrfStateGuard,
    private logger: Logger
  ) {
    super(settings, endpoint);

    const issuer = new Issuer({
      issuer: new URL(settings.authorizationUrl).origin,
      authorization_endpoint: settings.authorizationUrl,
      token_endpoint: settings.tokenUrl,
    });

    this.client = new issuer.Client({
      client_id: settings.clientId,
      client_secret: settings.clientSecret,
      redirect_uris: [settings.redirectUri],
      response_types: ['code'],
    });
  }

  /** Phase A: no request is made. Each call supersedes the previous state. */
  getAuthorizationUrl(): string {
    const state = this.stateGuard.issue();
    const details = this.authorizationDetailsField();

    const url = this.client.authorizationUrl({
      // undefined drops the parameter; leaving the key out would send scope=openid
      scope: this.settings.scope || undefined,
      redirect_uri: this.settings.redirectUri,
      response_type: 'code',
      state,
      ...details,
    });

    this.logger.debug('Created authorization URL', {
      authorizationUrl: this.settings.authorizationUrl,
      hasAuthorizationDetails: Object.keys(details).length > 0,
    });
    return url;
  }

  /**
   * Parse the redirect back to us and consume its state.
   *
   * @throws {OAuthDeniedError} If the server redirected with an `error`
   * @throws {AuthorizationResponseError} If `code` or `state` is missing
   * @throws {StateMismatchError} If the state was never issued, reused or stale
   */
  verifyCallback(callbackUrl: string): VerifiedCallback {
    let params: Record<string, unknown>;
    try {
      params = this.client.callbackParams(callbackUrl);
    } catch (error: unknown) {
      throw new AuthorizationResponseError('Authorization callback could not be parsed', {
        reason: error instanceof Error ? error.message : String(error),
      });
    }

    const { code, state, error, error_description: errorDescription } = params;

    if (typeof error === 'string') {
      throw new OAuthDeniedError(
        typeof errorDescription === 'string' ? errorDescription : 'Authorization was not granted',
        { error }
      );
    }

    if (typeof code !== 'string' || code === '' || typeof state !== 'string' || state === '') {
      throw new AuthorizationResponseError('Authorization callback is missing code or state', {
        hasCode: typeof code === 'string' && code !== '',
        hasState: typeof state === 'string' && state !== '',
      });
    }

    this.stateGuard.consume(state);
    return { code };
  }

  /** Phase B: POST the validated code to the token endpoint. */
  async exchange(callback: VerifiedCallback): Promise<TokenSet> {
    return this.endpoint.request('exchange', {
      grant_type: 'authorization_code',
      code: callback.code,
      redirect_uri: this.settings.redirectUri,
    });
  }

  async acquire(): Promise<TokenSet> {
    throw new ReauthenticationRequiredError(
      'User authorization required: redirect to getAuthorizationUrl() and exchange the callback',
      { grantType: this.kind }
    );
  }
}
