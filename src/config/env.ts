// src/config/env.ts

import dotenv from 'dotenv';
import { z } from 'zod';
import type { AuthConfig, InitConfig } from '../client';

const optionalNumber = z.coerce.number().positive().optional();

const StatusList = z
  .string()
  .transform((value) => value.split(',').map((part) => part.trim()).filter((part) => part !== ''))
  .pipe(z.array(z.coerce.number().int().min(100).max(599)));

const AuthorizationDetailsJson = z
  .string()
  .transform((value, ctx) => {
    try {
      const parsed: unknown = JSON.parse(value);
      return parsed;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Must be a JSON array' });
      return z.NEVER;
    }
  })
  .pipe(z.array(z.object({ type: z.string().min(1) }).passthrough()));

const EnvSchema = z
  .object({
    GRANTLINE_TOKEN_URL: z.string().url().optional(),
    GRANTLINE_CLIENT_ID: z.string().min(1).optional(),
    GRANTLINE_CLIENT_SECRET: z.string().min(1).optional(),
    GRANTLINE_SCOPE: z.string().optional(),
    GRANTLINE_AUTHORIZATION_URL: z.string().url().optional(),
    GRANTLINE_REDIRECT_URI: z.string().url().optional(),
    GRANTLINE_USERNAME: z.string().min(1).optional(),
    GRANTLINE_PASSWORD: z.string().min(1).optional(),
    GRANTLINE_AUTHORIZATION_DETAILS: AuthorizationDetailsJson.optional(),
    GRANTLINE_ENCRYPTION_KEY: z.string().optional(),
    GRANTLINE_GRANT_TYPE: z.enum(['client_credentials', 'password', 'authorization_code']).optional(),
    GRANTLINE_CLIENT_AUTH_METHOD: z.enum(['client_secret_post', 'client_secret_basic']).optional(),
    GRANTLINE_BEARER_TOKEN: z.string().min(1).optional(),
    GRANTLINE_HTTP_TIMEOUT_MS: optionalNumber,
    GRANTLINE_MAX_ATTEMPTS: z.coerce.number().int().min(1).optional(),
    GRANTLINE_BACKOFF_FACTOR: z.coerce.number().nonnegative().optional(),
    GRANTLINE_MAX_BACKOFF_SECONDS: optionalNumber,
    GRANTLINE_VERIFY_SSL: z.enum(['true', 'false', '1', '0']).optional(),
    GRANTLINE_STATUS_IGNORE: StatusList.optional(),
    GRANTLINE_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    GRANTLINE_LOG_FORMAT: z.enum(['json', 'pretty']).optional(),
    GRANTLINE_METRICS_ENABLED: z.enum(['true', 'false', '1', '0']).optional(),
  })
  .refine(
    (env) => !env.GRANTLINE_TOKEN_URL || (env.GRANTLINE_CLIENT_ID && env.GRANTLINE_CLIENT_SECRET),
    { message: 'GRANTLINE_TOKEN_URL requires GRANTLINE_CLIENT_ID and GRANTLINE_CLIENT_SECRET' }
  );

type ParsedEnv = z.infer<typeof EnvSchema>;

export interface LoadEnvOptions {
  /** Variables to read instead of `process.env`. No .env file is loaded when given. */
  env?: Record<string, string | undefined>;
  /** Path of the .env file loaded into `process.env`. */
  dotenvPath?: string;
}

/**
 * Build an InitConfig from `GRANTLINE_*` variables. Unset variables are left
 * out so the usual defaults apply.
 *
 * @throws {z.ZodError} If a variable is present but malformed
 */
export function loadConfigFromEnv(options: LoadEnvOptions = {}): InitConfig {
  const source = options.env ?? loadProcessEnv(options.dotenvPath);
  // Empty strings count as unset
  const present = Object.fromEntries(
    Object.entries(source).filter(([key, value]) => key.startsWith('GRANTLINE_') && value !== '')
  );
  const env = EnvSchema.parse(present);

  const config: InitConfig = {};

  const auth = buildAuth(env);
  if (auth) config.auth = auth;

  const retry = {
    ...(env.GRANTLINE_MAX_ATTEMPTS !== undefined ? { maxAttempts: env.GRANTLINE_MAX_ATTEMPTS } : {}),
    ...(env.GRANTLINE_BACKOFF_FACTOR !== undefined
      ? { backoffFactor: env.GRANTLINE_BACKOFF_FACTOR }
      : {}),
    ...(env.GRANTLINE_MAX_BACKOFF_SECONDS !== undefined
      ? { maxBackoffSeconds: env.GRANTLINE_MAX_BACKOFF_SECONDS }
      : {}),
  };

  const http = {
    ...(env.GRANTLINE_HTTP_TIMEOUT_MS !== undefined ? { timeout: env.GRANTLINE_HTTP_TIMEOUT_MS } : {}),
    ...(Object.keys(retry).length > 0 ? { retry } : {}),
    ...(env.GRANTLINE_VERIFY_SSL ? { verifySsl: isTrue(env.GRANTLINE_VERIFY_SSL) } : {}),
    ...(env.GRANTLINE_STATUS_IGNORE ? { statusIgnore: env.GRANTLINE_STATUS_IGNORE } : {}),
  };
  if (Object.keys(http).length > 0) {
    config.http = http;
  }

  if (env.GRANTLINE_LOG_LEVEL || env.GRANTLINE_LOG_FORMAT) {
    config.logging = {
      ...(env.GRANTLINE_LOG_LEVEL ? { level: env.GRANTLINE_LOG_LEVEL } : {}),
      ...(env.GRANTLINE_LOG_FORMAT ? { format: env.GRANTLINE_LOG_FORMAT } : {}),
    };
  }

  if (env.GRANTLINE_METRICS_ENABLED) {
    config.metrics = {
      enabled: isTrue(env.GRANTLINE_METRICS_ENABLED),
    };
  }

  return config;
}

function isTrue(flag: 'true' | 'false' | '1' | '0'): boolean {
  return flag === 'true' || flag === '1';
}

function loadProcessEnv(path?: string): NodeJS.ProcessEnv {
  dotenv.config(path ? { path } : {});
  return process.env;
}

function buildAuth(env: ParsedEnv): AuthConfig | undefined {
  if (env.GRANTLINE_BEARER_TOKEN) {
    return { type: 'bearer', token: env.GRANTLINE_BEARER_TOKEN };
  }

  const { GRANTLINE_TOKEN_URL: tokenUrl, GRANTLINE_CLIENT_ID: clientId } = env;
  const clientSecret = env.GRANTLINE_CLIENT_SECRET;
  if (!tokenUrl || !clientId || !clientSecret) return undefined;

  return {
    type: 'oauth2',
    tokenUrl,
    clientId,
    clientSecret,
    ...(env.GRANTLINE_SCOPE !== undefined ? { scope: env.GRANTLINE_SCOPE } : {}),
    ...(env.GRANTLINE_AUTHORIZATION_URL ? { authorizationUrl: env.GRANTLINE_AUTHORIZATION_URL } : {}),
    ...(env.GRANTLINE_REDIRECT_URI ? { redirectUri: env.GRANTLINE_REDIRECT_URI } : {}),
    ...(env.GRANTLINE_USERNAME ? { username: env.GRANTLINE_USERNAME } : {}),
    ...(env.GRANTLINE_PASSWORD ? { password: env.GRANTLINE_PASSWORD } : {}),
    ...(env.GRANTLINE_AUTHORIZATION_DETAILS
      ? { authorizationDetails: env.GRANTLINE_AUTHORIZATION_DETAILS }
      : {}),
    ...(env.GRANTLINE_ENCRYPTION_KEY ? { encryptionKey: env.GRANTLINE_ENCRYPTION_KEY } : {}),
    ...(env.GRANTLINE_GRANT_TYPE ? { grantType: env.GRANTLINE_GRANT_TYPE } : {}),
    ...(env.GRANTLINE_CLIENT_AUTH_METHOD
      ? { clientAuthMethod: env.GRANTLINE_CLIENT_AUTH_METHOD }
      : {}),
  };
}
