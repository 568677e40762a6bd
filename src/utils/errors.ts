// src/utils/errors.ts

export class SDKError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

// OAuth errors
export class OAuthError extends SDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'OAUTH_ERROR', details);
  }
}

export class OAuthConfigError extends OAuthError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'OAUTH_CONFIG_ERROR';
  }
}

/**
 * The authorization redirect could not be trusted: unparseable callback,
 * missing code/state, or a state that fails validation. Never retried.
 */
export class AuthorizationResponseError extends OAuthError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'AUTHORIZATION_RESPONSE_ERROR';
  }
}

export class StateMismatchError extends AuthorizationResponseError {
  constructor(message: string = 'State parameter mismatch', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'STATE_MISMATCH';
  }
}

export class OAuthDeniedError extends AuthorizationResponseError {
  constructor(message: string = 'User denied authorization', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'OAUTH_DENIED';
  }
}

// Token errors
export class TokenError extends SDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TOKEN_ERROR', details);
  }
}

/** Token endpoint answered with an OAuth error (4xx). */
export class TokenRequestError extends TokenError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'TOKEN_REQUEST_FAILED';
  }
}

/** Token endpoint answered 2xx with a body that is not a usable token response. */
export class TokenResponseError extends TokenError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'TOKEN_RESPONSE_INVALID';
  }
}

export class ReauthenticationRequiredError extends TokenError {
  constructor(
    message: string = 'Re-authentication required',
    details?: Record<string, unknown>
  ) {
    super(message, details);
    this.code = 'REAUTHENTICATION_REQUIRED';
  }
}

export class DecryptionError extends TokenError {
  constructor(message: string = 'Failed to decrypt token state', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'DECRYPTION_FAILED';
  }
}

// API errors
export class ApiError extends SDKError {
  constructor(
    message: string,
    public status: number,
    details?: Record<string, unknown>
  ) {
    super(message, 'API_ERROR', { ...details, status });
  }
}

export class PermanentClientError extends ApiError {
  constructor(message: string, status: number, details?: Record<string, unknown>) {
    super(message, status, details);
    this.code = 'API_CLIENT_ERROR';
  }
}

export class UnauthorizedError extends ApiError {
  constructor(message: string = 'Unauthorized', details?: Record<string, unknown>) {
    super(message, 401, details);
    this.code = 'API_UNAUTHORIZED';
  }
}

export class RetryableServerError extends ApiError {
  constructor(message: string, status: number, details?: Record<string, unknown>) {
    super(message, status, details);
    this.code = 'API_SERVER_ERROR';
  }
}

export class RateLimitError extends RetryableServerError {
  constructor(
    message: string = 'Rate limit exceeded',
    public retryAfter?: number,
    details?: Record<string, unknown>
  ) {
    super(message, 429, { ...details, retryAfter });
    this.code = 'RATE_LIMIT_EXCEEDED';
  }
}

// Network errors
export class NetworkError extends SDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NETWORK_ERROR', details);
  }
}

/** Connection, read or redirect failure; eligible for retry. */
export class TransientNetworkError extends NetworkError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'NETWORK_TRANSIENT';
  }
}

export class NetworkTimeoutError extends TransientNetworkError {
  constructor(message: string = 'Request timeout', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'NETWORK_TIMEOUT';
  }
}

export class RequestCancelledError extends NetworkError {
  constructor(message: string = 'Request cancelled', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'REQUEST_CANCELLED';
  }
}
