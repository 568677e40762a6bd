// tests/unit/env.test.ts

import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { loadConfigFromEnv } from '../../src/config/env';

const oauth2Env = {
  GRANTLINE_TOKEN_URL: 'https://auth.example.com/oauth/token',
  GRANTLINE_CLIENT_ID: 'test-client',
  GRANTLINE_CLIENT_SECRET: 'test-secret',
};

describe('loadConfigFromEnv', () => {
  it('should return an empty config when nothing is set', () => {
    expect(loadConfigFromEnv({ env: { PATH: '/usr/bin' } })).toEqual({});
  });

  it('should build an OAuth2 config', () => {
    const config = loadConfigFromEnv({
      env: {
        ...oauth2Env,
        GRANTLINE_SCOPE: 'read write',
        GRANTLINE_CLIENT_AUTH_METHOD: 'client_secret_basic',
        GRANTLINE_AUTHORIZATION_DETAILS: '[{"type":"account_information"}]',
      },
    });

    expect(config).toEqual({
      auth: {
        type: 'oauth2',
        tokenUrl: 'https://auth.example.com/oauth/token',
        clientId: 'test-client',
        clientSecret: 'test-secret',
        scope: 'read write',
        clientAuthMethod: 'client_secret_basic',
        authorizationDetails: [{ type: 'account_information' }],
      },
    });
  });

  it('should prefer a bearer token', () => {
    const config = loadConfigFromEnv({
      env: { ...oauth2Env, GRANTLINE_BEARER_TOKEN: 'test-token' },
    });

    expect(config.auth).toEqual({ type: 'bearer', token: 'test-token' });
  });

  it('should coerce transport, logging and metrics settings', () => {
    const config = loadConfigFromEnv({
      env: {
        GRANTLINE_HTTP_TIMEOUT_MS: '2500',
        GRANTLINE_MAX_ATTEMPTS: '2',
        GRANTLINE_BACKOFF_FACTOR: '0.5',
        GRANTLINE_LOG_LEVEL: 'debug',
        GRANTLINE_METRICS_ENABLED: '0',
      },
    });

    expect(config).toEqual({
      http: { timeout: 2500, retry: { maxAttempts: 2, backoffFactor: 0.5 } },
      logging: { level: 'debug' },
      metrics: { enabled: false },
    });
  });

  it('should read TLS verification and ignored statuses', () => {
    const config = loadConfigFromEnv({
      env: { GRANTLINE_VERIFY_SSL: '0', GRANTLINE_STATUS_IGNORE: '404, 409,' },
    });

    expect(config).toEqual({ http: { verifySsl: false, statusIgnore: [404, 409] } });
  });

  it('should reject ignored statuses outside the HTTP range', () => {
    expect(() => loadConfigFromEnv({ env: { GRANTLINE_STATUS_IGNORE: '404,700' } })).toThrow(ZodError);
  });

  it('should treat empty values as unset', () => {
    expect(loadConfigFromEnv({ env: { GRANTLINE_SCOPE: '', GRANTLINE_LOG_LEVEL: '' } })).toEqual({});
  });

  it('should require client credentials with a token URL', () => {
    expect(() =>
      loadConfigFromEnv({ env: { GRANTLINE_TOKEN_URL: 'https://auth.example.com/oauth/token' } })
    ).toThrow(ZodError);
  });

  it('should reject authorization details that are not JSON', () => {
    expect(() =>
      loadConfigFromEnv({ env: { ...oauth2Env, GRANTLINE_AUTHORIZATION_DETAILS: '{oops' } })
    ).toThrow('Must be a JSON array');
  });
});
