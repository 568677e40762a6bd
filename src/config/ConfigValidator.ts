// src/config/ConfigValidator.ts

import { z } from 'zod';

// Retry Policy Schema (every field optional, defaults live in BackoffScheduler)
const RetryPolicySchema = z
  .object({
    maxAttempts: z.number().int().min(1).max(10),
    backoffFactor: z.number().nonnegative(),
    retryableStatusCodes: z.array(z.number().int().min(100).max(599)),
    maxBackoffSeconds: z.number().positive(),
  })
  .partial();

const AuthorizationDetailSchema = z
  .object({
    type: z.string().min(1, 'Authorization detail requires a type'),
  })
  .passthrough();

// OAuth2 Configuration Schema
const OAuth2ConfigSchema = z
  .object({
    type: z.literal('oauth2').optional(),
    tokenUrl: z.string().url(),
    clientId: z.string().min(1),
    clientSecret: z.string().min(1),
    scope: z.string().optional(),
    authorizationUrl: z.string().url().optional(),
    redirectUri: z.string().url().optional(),
    username: z.string().min(1).optional(),
    password: z.string().min(1).optional(),
    authorizationDetails: z.array(AuthorizationDetailSchema).optional(),
    encryptionKey: z
      .string()
      .regex(
        /^[0-9a-f]{64}$/i,
        'Encryption key must be a valid 32-byte hexadecimal string (0-9, a-f)'
      )
      .optional(),
    grantType: z.enum(['client_credentials', 'password', 'authorization_code']).optional(),
    clientAuthMethod: z.enum(['client_secret_post', 'client_secret_basic']).optional(),
    expirySkewSeconds: z.number().nonnegative().optional(),
    stateTtlSeconds: z.number().positive().optional(),
  })
  .refine((data) => !data.authorizationUrl || data.redirectUri, {
    message: "Authorization code grant requires 'redirectUri'",
    path: ['redirectUri'],
  })
  .refine((data) => !data.username || data.password, {
    message: "Password grant requires 'password' when 'username' is set",
    path: ['password'],
  })
  .refine(
    (data) =>
      data.grantType !== 'authorization_code' || (data.authorizationUrl && data.redirectUri),
    {
      message: "Authorization code grant requires 'authorizationUrl' and 'redirectUri'",
      path: ['grantType'],
    }
  )
  .refine((data) => data.grantType !== 'password' || (data.username && data.password), {
    message: "Password grant requires 'username' and 'password'",
    path: ['grantType'],
  });

const BearerAuthSchema = z.object({
  type: z.literal('bearer'),
  token: z.string().min(1),
});

const BasicAuthSchema = z.object({
  type: z.literal('basic'),
  username: z.string().min(1),
  password: z.string(),
});

const ProxyConfigSchema = z.union([
  z.object({
    protocol: z.enum(['http', 'https']).optional(),
    host: z.string().min(1),
    port: z.number().int().min(1).max(65535),
    auth: z.object({ username: z.string(), password: z.string() }).optional(),
  }),
  z.literal(false),
]);

// Logger Configuration Schema
const LoggerConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    format: z.enum(['json', 'pretty']).optional(),
    silent: z.boolean().optional(),
  })
  .optional();

// Metrics Configuration Schema
const MetricsConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
  })
  .optional();

// Complete Init Configuration Schema
export const InitConfigSchema = z.object({
  auth: z.union([BearerAuthSchema, BasicAuthSchema, OAuth2ConfigSchema]).optional(),
  http: z
    .object({
      timeout: z.number().positive().optional(),
      keepAlive: z.boolean().optional(),
      userAgent: z.string().min(1).optional(),
      retry: RetryPolicySchema.optional(),
      verifySsl: z.boolean().optional(),
      statusIgnore: z.array(z.number().int().min(100).max(599)).optional(),
      proxy: ProxyConfigSchema.optional(),
    })
    .optional(),
  metrics: MetricsConfigSchema,
  logging: LoggerConfigSchema,
});

export type ValidatedInitConfig = z.infer<typeof InitConfigSchema>;

/**
 * Validate client initialization configuration
 *
 * @param config - Configuration object to validate
 * @returns Validated configuration
 * @throws {z.ZodError} If configuration is invalid with detailed error messages
 */
export function validateConfig(config: unknown): ValidatedInitConfig {
  return InitConfigSchema.parse(config);
}

export type SafeValidationResult =
  | { success: true; data: ValidatedInitConfig }
  | { success: false; errors: string[] };

/**
 * Validate configuration and return user-friendly errors
 */
export function validateConfigSafe(config: unknown): SafeValidationResult {
  const result = InitConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
  };
}
