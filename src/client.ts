// src/client.ts

import type { Agent as HttpAgent } from 'http';
import type { Agent as HttpsAgent } from 'https';
import type { AxiosProxyConfig } from 'axios';
import type { AuthProvider, OAuth2Config } from './core/auth/types';
import type { TokenSet } from './core/token/types';
import type {
  AttemptOutcome,
  HttpRequestConfig,
  HttpResponse,
  RetryClassifier,
  RetryPolicy,
  Sleep,
} from './core/http/types';
import { HttpCore } from './core/http/HttpCore';
import { DEFAULT_RETRY_POLICY } from './core/http/BackoffScheduler';
import { OAuth2Coordinator } from './core/auth/OAuth2Coordinator';
import { BasicAuth, StaticBearerAuth } from './core/auth/StaticAuth';
import { Logger } from './observability/Logger';
import type { LoggerConfig } from './observability/Logger';
import { MetricsCollector } from './observability/MetricsCollector';
import type { MetricsConfig } from './observability/MetricsCollector';
import { validateConfig } from './config/ConfigValidator';
import type { ValidatedInitConfig } from './config/ConfigValidator';
import {
  OAuthConfigError,
  PermanentClientError,
  RateLimitError,
  RetryableServerError,
  UnauthorizedError,
} from './utils/errors';

export interface BearerAuthConfig {
  type: 'bearer';
  token: string;
}

export interface BasicAuthConfig {
  type: 'basic';
  username: string;
  password: string;
}

export interface OAuth2AuthConfig extends OAuth2Config {
  type?: 'oauth2';
}

export type AuthConfig = OAuth2AuthConfig | BearerAuthConfig | BasicAuthConfig;

export interface InitConfig {
  auth?: AuthConfig;
  http?: {
    timeout?: number;
    keepAlive?: boolean;
    userAgent?: string;
    retry?: Partial<RetryPolicy>;
    shouldRetry?: RetryClassifier;
    /** Check server certificates on HTTPS. Defaults to true. */
    verifySsl?: boolean;
    /** Final statuses returned as responses instead of raised. */
    statusIgnore?: number[];
    httpAgent?: HttpAgent;
    httpsAgent?: HttpsAgent;
    proxy?: AxiosProxyConfig | false;
  };
  logging?: LoggerConfig;
  metrics?: MetricsConfig;
}

export interface ClientOptions {
  /** Replaces the backoff timer; tests pass a recorder here. */
  sleep?: Sleep;
}

export interface RequestOptions extends HttpRequestConfig {
  /** Raise typed errors for non-2xx final responses. Defaults to true. */
  raiseForStatus?: boolean;
  /** Statuses not raised for this request, on top of the client's `statusIgnore`. */
  statusIgnore?: number[];
}

// Options zod cannot carry through validation: functions and agent instances
type RuntimeHttpOptions = Pick<
  NonNullable<InitConfig['http']>,
  'shouldRetry' | 'httpAgent' | 'httpsAgent'
>;

export type ResponseClass = 'ok' | 'unauthorized' | 'retryable' | 'permanent';

interface ClientCore {
  logger: Logger;
  metrics: MetricsCollector;
  http: HttpCore;
  auth?: AuthProvider;
  statusIgnore: ReadonlySet<number>;
}

export class GrantlineClient {
  private core: ClientCore;

  private constructor(
    config: ValidatedInitConfig,
    runtime: RuntimeHttpOptions,
    options: ClientOptions
  ) {
    // Build dependencies first, auth last since it needs the transport
    const logger = new Logger(config.logging);
    const metrics = new MetricsCollector(config.metrics, logger);
    const retry = config.http?.retry ?? {};
    const retryPolicy: RetryPolicy = {
      maxAttempts: retry.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts,
      backoffFactor: retry.backoffFactor ?? DEFAULT_RETRY_POLICY.backoffFactor,
      retryableStatusCodes: retry.retryableStatusCodes ?? DEFAULT_RETRY_POLICY.retryableStatusCodes,
      maxBackoffSeconds: retry.maxBackoffSeconds ?? DEFAULT_RETRY_POLICY.maxBackoffSeconds,
    };
    const http = new HttpCore(
      {
        timeout: config.http?.timeout,
        keepAlive: config.http?.keepAlive,
        userAgent: config.http?.userAgent,
        verifySsl: config.http?.verifySsl,
        proxy: config.http?.proxy,
        shouldRetry: runtime.shouldRetry,
        httpAgent: runtime.httpAgent,
        httpsAgent: runtime.httpsAgent,
      },
      retryPolicy,
      metrics,
      logger,
      { sleep: options.sleep }
    );

    const auth = GrantlineClient.createAuth(config, { logger, metrics, http });
    this.core = { logger, metrics, http, auth, statusIgnore: new Set(config.http?.statusIgnore) };
  }

  /**
   * Create a client.
   *
   * @throws {z.ZodError} If the configuration is invalid
   * @throws {OAuthConfigError} If the OAuth2 settings do not describe a usable grant
   *
   * @example
   * ```typescript
   * const client = await GrantlineClient.init({
   *   auth: {
   *     tokenUrl: 'https://auth.example.com/oauth/token',
   *     clientId: process.env.CLIENT_ID,
   *     clientSecret: process.env.CLIENT_SECRET,
   *     scope: 'read write',
   *   },
   *   http: { retry: { maxAttempts: 4 } },
   * });
   *
   * const response = await client.get('https://api.example.com/items');
   * ```
   */
  static async init(config: InitConfig = {}, options: ClientOptions = {}): Promise<GrantlineClient> {
    const validated = validateConfig(config);
    const client = new GrantlineClient(
      validated,
      {
        shouldRetry: config.http?.shouldRetry,
        httpAgent: config.http?.httpAgent,
        httpsAgent: config.http?.httpsAgent,
      },
      options
    );

    client.core.logger.info('Client initialized', {
      auth: validated.auth ? (validated.auth.type ?? 'oauth2') : 'none',
    });

    return client;
  }

  private static createAuth(
    config: ValidatedInitConfig,
    deps: Pick<ClientCore, 'logger' | 'metrics' | 'http'>
  ): AuthProvider | undefined {
    const auth = config.auth;
    if (!auth) return undefined;

    switch (auth.type) {
      case 'bearer':
        return new StaticBearerAuth(auth.token);
      case 'basic':
        return new BasicAuth(auth.username, auth.password);
      default:
        return OAuth2Coordinator.fromConfig(auth, deps);
    }
  }

  /** The OAuth2 coordinator, when OAuth2 is configured. Emits lifecycle events. */
  get oauth2(): OAuth2Coordinator | undefined {
    return this.core.auth instanceof OAuth2Coordinator ? this.core.auth : undefined;
  }

  /** Authorization header for the current credentials, or undefined without auth. */
  async getAuthorizationHeader(): Promise<string | undefined> {
    return this.core.auth?.getHeader();
  }

  /** The transport's retry classification for one attempt outcome. */
  shouldRetry(outcome: AttemptOutcome): boolean {
    return this.core.http.backoff.shouldRetry(outcome);
  }

  classify(status: number): ResponseClass {
    if (status < 400) return 'ok';
    if (status === 401) return 'unauthorized';
    if (status >= 500 || this.core.http.backoff.isRetryableStatus(status)) return 'retryable';
    return 'permanent';
  }

  /**
   * Send a request with the current authorization header through the
   * retrying transport. A 401 invalidates the token and the whole request is
   * tried once more with a fresh header.
   *
   * @throws {UnauthorizedError} If the second pass also ends in 401
   * @throws {PermanentClientError | RetryableServerError | RateLimitError}
   * For other error statuses, unless `raiseForStatus` is false or the status
   * is in `statusIgnore`
   */
  async request(config: RequestOptions): Promise<HttpResponse> {
    const { raiseForStatus = true, statusIgnore = [], ...requestConfig } = config;

    let header = await this.getAuthorizationHeader();
    let response = await this.send(requestConfig, header);

    if (this.classify(response.status) === 'unauthorized' && this.core.auth) {
      const retry = await this.core.auth.invalidate(header);
      if (retry) {
        this.core.logger.info('Retrying request with a fresh authorization header', {
          url: requestConfig.url.split('?')[0],
        });
        header = await this.getAuthorizationHeader();
        response = await this.send(requestConfig, header);
      }
    }

    if (raiseForStatus) {
      this.raiseForStatus(response, requestConfig, statusIgnore);
    }
    return response;
  }

  async get(url: string, config: Omit<RequestOptions, 'url' | 'method'> = {}): Promise<HttpResponse> {
    return this.request({ ...config, url, method: 'GET' });
  }

  async post(
    url: string,
    body: unknown,
    config: Omit<RequestOptions, 'url' | 'method' | 'body'> = {}
  ): Promise<HttpResponse> {
    return this.request({ ...config, url, method: 'POST', body });
  }

  getAuthorizationUrl(): string {
    return this.requireOAuth2().getAuthorizationUrl();
  }

  async exchangeCodeForToken(callbackUrl: string): Promise<TokenSet> {
    return this.requireOAuth2().exchangeCodeForToken(callbackUrl);
  }

  /** Prometheus text exposition of this client's metrics. */
  async getMetrics(): Promise<string> {
    return this.core.metrics.getMetrics();
  }

  /** Drop stored tokens and close pooled connections. */
  async destroy(): Promise<void> {
    const coordinator = this.oauth2;
    if (coordinator) {
      await coordinator.reset();
      coordinator.removeAllListeners();
    }
    this.core.http.destroy();
    this.core.logger.info('Client destroyed');
  }

  private async send(config: HttpRequestConfig, header: string | undefined): Promise<HttpResponse> {
    return this.core.http.request({
      ...config,
      headers: {
        ...config.headers,
        ...(header ? { Authorization: header } : {}),
      },
    });
  }

  private raiseForStatus(
    response: HttpResponse,
    config: HttpRequestConfig,
    statusIgnore: number[]
  ): void {
    if (this.core.statusIgnore.has(response.status) || statusIgnore.includes(response.status)) {
      return;
    }

    const details = {
      method: config.method ?? 'GET',
      url: config.url.split('?')[0],
      attempts: response.attempts,
    };

    switch (this.classify(response.status)) {
      case 'ok':
        return;
      case 'unauthorized':
        throw new UnauthorizedError('Request unauthorized after token refresh', details);
      case 'retryable': {
        if (response.status === 429) {
          const retryAfter = Number(response.headers['retry-after']);
          throw new RateLimitError(
            'Rate limit exceeded',
            Number.isFinite(retryAfter) ? retryAfter : undefined,
            details
          );
        }
        throw new RetryableServerError(
          `Request failed with status ${response.status}`,
          response.status,
          details
        );
      }
      case 'permanent':
        throw new PermanentClientError(
          `Request failed with status ${response.status}`,
          response.status,
          details
        );
    }
  }

  private requireOAuth2(): OAuth2Coordinator {
    const coordinator = this.oauth2;
    if (!coordinator) {
      throw new OAuthConfigError('OAuth2 is not configured for this client');
    }
    return coordinator;
  }
}
