// src/core/auth/OAuth2Coordinator.ts

import { EventEmitter } from 'events';
import type {
  AuthProvider,
  CoordinatorState,
  GrantSettings,
  GrantStrategy,
  OAuth2Config,
  TokenOperation,
} from './types';
import type { TokenSet } from '../token/types';
import { isTokenExpired } from '../token/types';
import { EncryptedTokenStore } from '../token/EncryptedTokenStore';
import type { HttpCore } from '../http/HttpCore';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import { addSpanEvent } from '../../observability/tracing';
import { CsrfStateGuard } from './CsrfStateGuard';
import { TokenEndpoint } from './grants/TokenEndpoint';
import { AuthorizationCodeGrant } from './grants/AuthorizationCodeGrant';
import { createGrantStrategy, resolveGrantSettings } from './grants';
import { DecryptionError, OAuthConfigError, ReauthenticationRequiredError } from '../../utils/errors';

// expiresAt written by invalidate(): the epoch
const INVALIDATED_AT = 0;

export interface CoordinatorDeps {
  store: EncryptedTokenStore;
  http: HttpCore;
  metrics: MetricsCollector;
  logger: Logger;
}

export interface CoordinatorOptions {
  stateTtlSeconds?: number;
}

export function formatAuthorizationHeader(token: TokenSet): string {
  return `${token.tokenType} ${token.accessToken}`;
}

/**
 * Owns the token lifecycle for one credential set: reads the store, decides
 * between acquire and refresh, and makes sure at most one token request is
 * outstanding. Concurrent callers join the flight in progress.
 *
 * Events: `stateChange`, `tokenAcquired`, `tokenRefreshed`, `tokenInvalidated`.
 */
export class OAuth2Coordinator extends EventEmitter implements AuthProvider {
  private state: CoordinatorState = 'unauthenticated';
  private inflight?: Promise<TokenSet>;
  // Bumped around every store mutation so a read can tell it went stale
  private generation = 0;
  private strategy: GrantStrategy;
  private stateGuard: CsrfStateGuard;
  private store: EncryptedTokenStore;
  private metrics: MetricsCollector;
  private logger: Logger;

  constructor(
    private settings: GrantSettings,
    deps: CoordinatorDeps,
    options: CoordinatorOptions = {}
  ) {
    super();
    this.store = deps.store;
    this.metrics = deps.metrics;
    this.logger = deps.logger;

    const ttlMs = options.stateTtlSeconds !== undefined ? options.stateTtlSeconds * 1000 : undefined;
    this.stateGuard = new CsrfStateGuard(deps.logger, ttlMs);

    const endpoint = new TokenEndpoint(settings, deps.http, deps.metrics, deps.logger);
    this.strategy = createGrantStrategy(settings, endpoint, this.stateGuard, deps.logger);
  }

  /**
   * Build a coordinator and its encrypted store from a flat config.
   *
   * @throws {OAuthConfigError} If the grant cannot be resolved or no key is available
   */
  static fromConfig(
    config: OAuth2Config,
    deps: Omit<CoordinatorDeps, 'store'>
  ): OAuth2Coordinator {
    const settings = resolveGrantSettings(config);
    const store = new EncryptedTokenStore(
      {
        encryptionKey: config.encryptionKey,
        clientSecret: config.clientSecret,
        expirySkewSeconds: config.expirySkewSeconds,
      },
      deps.logger
    );

    deps.logger.info('OAuth2 coordinator configured', {
      grant: settings.kind,
      tokenUrl: settings.tokenUrl,
      clientAuthMethod: settings.clientAuthMethod,
    });

    return new OAuth2Coordinator(settings, { ...deps, store }, {
      stateTtlSeconds: config.stateTtlSeconds,
    });
  }

  get grantKind(): GrantSettings['kind'] {
    return this.settings.kind;
  }

  getState(): CoordinatorState {
    return this.state;
  }

  /**
   * `"<Type> <token>"` for the current token, acquiring or refreshing first
   * when needed.
   *
   * @throws {ReauthenticationRequiredError} If the refresh token was rejected
   * or the grant needs user interaction
   * @throws {DecryptionError} If the stored state is unreadable (the store is cleared)
   */
  async getHeader(): Promise<string> {
    return formatAuthorizationHeader(await this.getToken());
  }

  async getToken(): Promise<TokenSet> {
    for (;;) {
      if (this.inflight) {
        this.metrics.incrementCounter('token_flight_joins', { grant: this.settings.kind });
        addSpanEvent('token.flight.join', { grant: this.settings.kind });
        return this.inflight;
      }

      const generation = this.generation;
      const token = await this.readStore();

      // Another caller replaced the token or started a flight while we read
      if (generation !== this.generation || this.inflight) continue;

      if (token && !isTokenExpired(token, this.store.expirySkewMs)) {
        if (this.state !== 'authenticated') this.transition('authenticated');
        return token;
      }

      if (token) {
        this.transition('expired');
      }

      const refreshToken = token?.refreshToken;
      if (refreshToken) {
        return this.startFlight('refresh', () => this.strategy.refresh(refreshToken));
      }
      return this.startFlight('acquire', () => this.strategy.acquire());
    }
  }

  /**
   * Handle a 401 for `usedHeader`. Does nothing when the cached token has
   * already been replaced; otherwise marks it expired, or drops it when there
   * is no refresh token. Resolves true when another attempt may succeed.
   */
  async invalidate(usedHeader: string | undefined): Promise<boolean> {
    if (usedHeader === undefined) return false;
    if (this.inflight) return true;

    const generation = this.generation;
    const token = await this.readStore();

    if (generation !== this.generation || this.inflight) return true;

    if (!token) return this.canAcquireUnattended();

    if (formatAuthorizationHeader(token) !== usedHeader) {
      this.logger.debug('Ignoring invalidation for a token that was already replaced');
      return true;
    }

    const hasRefreshToken = token.refreshToken !== undefined;

    // An earlier 401 for this header already marked it; the next header refreshes
    if (hasRefreshToken && token.expiresAt?.getTime() === INVALIDATED_AT) {
      return true;
    }

    if (hasRefreshToken) {
      await this.mutate(() => this.store.write({ ...token, expiresAt: new Date(INVALIDATED_AT) }));
      this.transition('expired');
    } else {
      await this.mutate(() => this.store.clear());
      this.transition('unauthenticated');
    }

    this.logger.info('Token invalidated after 401', { grant: this.settings.kind, hasRefreshToken });
    this.emit('tokenInvalidated', { grant: this.settings.kind, hasRefreshToken });

    return hasRefreshToken || this.canAcquireUnattended();
  }

  /** Phase A of the authorization code grant. No request is made. */
  getAuthorizationUrl(): string {
    return this.authorizationCodeGrant().getAuthorizationUrl();
  }

  /**
   * Phase B: validate the callback, then exchange its code. The state is
   * checked before anything is awaited, so a forged callback never reaches
   * the network.
   */
  async exchangeCodeForToken(callbackUrl: string): Promise<TokenSet> {
    const grant = this.authorizationCodeGrant();
    const callback = grant.verifyCallback(callbackUrl);

    while (this.inflight) {
      await Promise.allSettled([this.inflight]);
    }

    return this.startFlight('exchange', () => grant.exchange(callback));
  }

  /** Drop the stored token. A flight already in progress still completes. */
  async reset(): Promise<void> {
    await this.mutate(() => this.store.clear());
    this.transition('unauthenticated');
  }

  private canAcquireUnattended(): boolean {
    return this.settings.kind !== 'authorization_code';
  }

  private authorizationCodeGrant(): AuthorizationCodeGrant {
    if (!(this.strategy instanceof AuthorizationCodeGrant)) {
      throw new OAuthConfigError('Authorization code grant is not configured', {
        grant: this.settings.kind,
      });
    }
    return this.strategy;
  }

  private async readStore(): Promise<TokenSet | null> {
    try {
      return await this.store.read();
    } catch (error: unknown) {
      if (error instanceof DecryptionError) {
        this.logger.error('Stored token state is unreadable, clearing it', { reason: error.message });
        await this.mutate(() => this.store.clear());
        this.transition('unauthenticated');
      }
      throw error;
    }
  }

  private async mutate(change: () => Promise<void>): Promise<void> {
    this.generation++;
    try {
      await change();
    } finally {
      this.generation++;
    }
  }

  /**
   * Claim the flight slot synchronously. The slot is released when the flight
   * settles either way, before any joined caller resumes.
   */
  private startFlight(operation: TokenOperation, run: () => Promise<TokenSet>): Promise<TokenSet> {
    const flight = this.runFlight(operation, run);
    this.inflight = flight;

    const release = (): void => {
      if (this.inflight === flight) this.inflight = undefined;
    };
    void flight.then(release, release);

    return flight;
  }

  private async runFlight(operation: TokenOperation, run: () => Promise<TokenSet>): Promise<TokenSet> {
    const grant = this.settings.kind;
    const previousState = this.state;
    this.transition(operation === 'refresh' ? 'refreshing' : 'acquiring');
    this.logger.debug('Token flight started', { grant, operation });

    try {
      const token = await run();
      await this.mutate(() => this.store.write(token));
      this.transition('authenticated');

      this.emit(operation === 'refresh' ? 'tokenRefreshed' : 'tokenAcquired', {
        grant,
        operation,
        expiresAt: token.expiresAt,
      });
      return token;
    } catch (error: unknown) {
      if (error instanceof ReauthenticationRequiredError) {
        if (operation === 'refresh') {
          await this.mutate(() => this.store.clear());
          this.logger.warn('Refresh token rejected, cleared stored token', { grant });
        }
        this.transition('reauthenticating');
      } else {
        this.transition(previousState);
      }
      throw error;
    }
  }

  private transition(next: CoordinatorState): void {
    const previous = this.state;
    if (previous === next) return;
    this.state = next;
    this.logger.debug('Coordinator state changed', { from: previous, to: next });
    this.emit('stateChange', { from: previous, to: next });
  }
}
