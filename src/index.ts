// src/index.ts

export { GrantlineClient } from './client';
export type {
  InitConfig,
  AuthConfig,
  OAuth2AuthConfig,
  BearerAuthConfig,
  BasicAuthConfig,
  ClientOptions,
  RequestOptions,
  ResponseClass,
} from './client';
export { loadConfigFromEnv } from './config/env';
export type { LoadEnvOptions } from './config/env';
export { validateConfig, validateConfigSafe, InitConfigSchema } from './config/ConfigValidator';

export { OAuth2Coordinator, formatAuthorizationHeader } from './core/auth/OAuth2Coordinator';
export { CsrfStateGuard } from './core/auth/CsrfStateGuard';
export { StaticBearerAuth, BasicAuth } from './core/auth/StaticAuth';
export {
  resolveGrantSettings,
  createGrantStrategy,
  TokenEndpoint,
  ClientCredentialsGrant,
  PasswordGrant,
  AuthorizationCodeGrant,
} from './core/auth/grants';
export type {
  AuthProvider,
  AuthorizationDetail,
  ClientAuthMethod,
  CoordinatorState,
  GrantKind,
  GrantSettings,
  GrantStrategy,
  OAuth2Config,
} from './core/auth/types';

export { EncryptedTokenStore } from './core/token/EncryptedTokenStore';
export { TokenEncryption } from './core/token/TokenEncryption';
export type { TokenSet, TokenStoreConfig } from './core/token/types';

export { HttpCore } from './core/http/HttpCore';
export { BackoffScheduler, DEFAULT_RETRY_POLICY } from './core/http/BackoffScheduler';
export { RetryHandler } from './core/http/RetryHandler';
export type {
  AttemptOutcome,
  HttpConfig,
  HttpRequestConfig,
  HttpResponse,
  ResponseBody,
  RetryClassifier,
  RetryPolicy,
} from './core/http/types';

export { Logger } from './observability/Logger';
export type { LoggerConfig } from './observability/Logger';
export { MetricsCollector } from './observability/MetricsCollector';
export type { MetricsConfig } from './observability/MetricsCollector';

// Export error classes for error handling
export {
  SDKError,
  OAuthError,
  OAuthConfigError,
  AuthorizationResponseError,
  StateMismatchError,
  OAuthDeniedError,
  TokenError,
  TokenRequestError,
  TokenResponseError,
  ReauthenticationRequiredError,
  DecryptionError,
  ApiError,
  PermanentClientError,
  UnauthorizedError,
  RetryableServerError,
  RateLimitError,
  NetworkError,
  TransientNetworkError,
  NetworkTimeoutError,
  RequestCancelledError,
} from './utils/errors';
