// src/core/auth/grants/TokenEndpoint.ts

import { z } from 'zod';
import type { GrantSettings, TokenOperation } from '../types';
import type { TokenSet } from '../../token/types';
import type { HttpCore } from '../../http/HttpCore';
import type { HttpResponse, ResponseBody } from '../../http/types';
import type { Logger } from '../../../observability/Logger';
import type { MetricsCollector } from '../../../observability/MetricsCollector';
import { isRecord } from '../../http/ResponseBody';
import { withGrantSpan } from '../../../observability/tracing';
import {
  RateLimitError,
  ReauthenticationRequiredError,
  RetryableServerError,
  TokenRequestError,
  TokenResponseError,
} from '../../../utils/errors';

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().nullish(),
  expires_in: z
    .union([z.number().nonnegative(), z.string().regex(/^\d+$/).transform(Number)])
    .nullish(),
  refresh_token: z.string().nullish(),
  scope: z.string().nullish(),
});

const OAuthErrorSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

// Errors from the refresh grant meaning the refresh token itself is dead
const REVOKED_REFRESH_ERRORS = new Set(['invalid_grant']);

export interface OAuthErrorBody {
  error?: string;
  errorDescription?: string;
}

/**
 * One form-encoded POST to the token endpoint per call, through the retrying
 * transport, with client authentication applied and the answer parsed into a
 * TokenSet.
 */
export class TokenEndpoint {
  constructor(
    private settings: GrantSettings,
    private http: HttpCore,
    private metrics: MetricsCollector,
    private logger: Logger
  ) {}

  async request(
    operation: TokenOperation,
    fields: Record<string, string>,
    previousRefreshToken?: string
  ): Promise<TokenSet> {
    const grant = this.settings.kind;

    return withGrantSpan(operation, grant, async () => {
      const startTime = Date.now();
      let status = 'error';

      try {
        const response = await this.http.request({
          url: this.settings.tokenUrl,
          method: 'POST',
          headers: this.buildHeaders(),
          body: this.buildBody(fields).toString(),
          maxRedirects: 0,
        });
        status = response.status.toString();

        const tokenSet = this.handleResponse(operation, response, previousRefreshToken);

        this.logger.info('Token endpoint exchange succeeded', {
          grant,
          operation,
          attempts: response.attempts,
          hasRefreshToken: tokenSet.refreshToken !== undefined,
        });

        return tokenSet;
      } catch (error: unknown) {
        this.logger.error('Token endpoint exchange failed', {
          grant,
          operation,
          error: error instanceof Error ? error.message : String(error),
        });
        throw error;
      } finally {
        this.metrics.incrementCounter('token_requests_total', { grant, operation, status });
        this.metrics.recordLatency('token_request_duration', Date.now() - startTime, {
          grant,
          operation,
          status,
        });
      }
    });
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/x-www-form-urlencoded;charset=UTF-8',
      Accept: 'application/json',
    };

    if (this.settings.clientAuthMethod === 'client_secret_basic') {
      const credentials = `${encodeURIComponent(this.settings.clientId)}:${encodeURIComponent(
        this.settings.clientSecret
      )}`;
      headers.Authorization = `Basic ${Buffer.from(credentials, 'utf8').toString('base64')}`;
    }

    return headers;
  }

  private buildBody(fields: Record<string, string>): URLSearchParams {
    const form = new URLSearchParams(fields);

    if (this.settings.clientAuthMethod === 'client_secret_post') {
      form.set('client_id', this.settings.clientId);
      form.set('client_secret', this.settings.clientSecret);
    }

    return form;
  }

  private handleResponse(
    operation: TokenOperation,
    response: HttpResponse,
    previousRefreshToken: string | undefined
  ): TokenSet {
    const { status } = response;
    const context = { operation, status, attempts: response.attempts };

    if (status >= 200 && status < 300) {
      return parseTokenResponse(response.body, previousRefreshToken, context);
    }

    const oauthError = extractOAuthError(response.body);

    if (
      operation === 'refresh' &&
      (status === 400 || status === 401) &&
      oauthError.error !== undefined &&
      REVOKED_REFRESH_ERRORS.has(oauthError.error)
    ) {
      throw new ReauthenticationRequiredError('Refresh token rejected, full authorization required', {
        ...context,
        error: oauthError.error,
      });
    }

    if (status === 429) {
      const retryAfter = Number(response.headers['retry-after']);
      throw new RateLimitError(
        'Token endpoint rate limit exceeded',
        Number.isFinite(retryAfter) ? retryAfter : undefined,
        context
      );
    }

    if (status >= 500 || this.http.backoff.isRetryableStatus(status)) {
      throw new RetryableServerError(`Token endpoint error: ${status}`, status, context);
    }

    throw new TokenRequestError(
      oauthError.errorDescription ?? oauthError.error ?? `Token endpoint returned ${status}`,
      { ...context, error: oauthError.error }
    );
  }
}

export function extractOAuthError(body: ResponseBody): OAuthErrorBody {
  if (body.kind !== 'json' && body.kind !== 'form') return {};
  const parsed = OAuthErrorSchema.safeParse(body.value);
  if (!parsed.success) return {};
  return { error: parsed.data.error, errorDescription: parsed.data.error_description };
}

/**
 * Map a 2xx token endpoint body to a TokenSet. JSON and form bodies are
 * accepted; raw or empty bodies are rejected rather than guessed at.
 */
export function parseTokenResponse(
  body: ResponseBody,
  previousRefreshToken: string | undefined,
  context: Record<string, unknown> = {},
  now: number = Date.now()
): TokenSet {
  if (body.kind === 'raw' || body.kind === 'empty') {
    throw new TokenResponseError('Token endpoint returned an unreadable response', {
      ...context,
      bodyKind: body.kind,
      contentType: body.kind === 'raw' ? body.contentType : undefined,
    });
  }

  if (!isRecord(body.value)) {
    throw new TokenResponseError('Token endpoint response is not an object', context);
  }

  const parsed = TokenResponseSchema.safeParse(body.value);
  if (!parsed.success) {
    throw new TokenResponseError('Token endpoint response is missing required fields', {
      ...context,
      fields: parsed.error.issues.map((issue) => issue.path.join('.')),
    });
  }

  const data = parsed.data;
  const expiresAt =
    data.expires_in !== null && data.expires_in !== undefined
      ? new Date(now + data.expires_in * 1000)
      : undefined;
  // Out of Date range: a huge expires_in or a digit string beyond Number precision
  if (expiresAt !== undefined && Number.isNaN(expiresAt.getTime())) {
    throw new TokenResponseError('Token endpoint returned an unusable expires_in', context);
  }

  const tokenType = !data.token_type || data.token_type.toLowerCase() === 'bearer' ? 'Bearer' : data.token_type;
  const refreshToken = data.refresh_token ?? previousRefreshToken;

  return {
    accessToken: data.access_token,
    tokenType,
    ...(refreshToken ? { refreshToken } : {}),
    ...(expiresAt !== undefined ? { expiresAt } : {}),
    ...(data.scope ? { scope: data.scope } : {}),
  };
}
