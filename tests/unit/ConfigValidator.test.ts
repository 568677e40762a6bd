// tests/unit/ConfigValidator.test.ts

import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { validateConfig, validateConfigSafe } from '../../src/config/ConfigValidator';

const oauth2 = {
  tokenUrl: 'https://auth.example.com/oauth/token',
  clientId: 'test-client',
  clientSecret: 'test-secret',
};

describe('ConfigValidator', () => {
  it('should accept an empty configuration', () => {
    expect(validateConfig({})).toEqual({});
  });

  it('should accept each auth variant', () => {
    expect(validateConfig({ auth: { type: 'bearer', token: 'test-token' } }).auth).toEqual({
      type: 'bearer',
      token: 'test-token',
    });
    expect(
      validateConfig({ auth: { type: 'basic', username: 'test-user', password: 'test-password' } })
        .auth
    ).toEqual({ type: 'basic', username: 'test-user', password: 'test-password' });
    expect(validateConfig({ auth: oauth2 }).auth).toEqual(oauth2);
  });

  it('should keep extra fields of authorization details', () => {
    const details = [{ type: 'payment_initiation', instructedAmount: { amount: '10.00' } }];

    const validated = validateConfig({ auth: { ...oauth2, authorizationDetails: details } });

    expect(validated.auth).toMatchObject({ authorizationDetails: details });
  });

  it('should reject a malformed encryption key', () => {
    expect(() => validateConfig({ auth: { ...oauth2, encryptionKey: 'not-hex' } })).toThrow(
      ZodError
    );
  });

  it('should require a redirect URI with an authorization URL', () => {
    const result = validateConfigSafe({
      auth: { ...oauth2, authorizationUrl: 'https://auth.example.com/authorize' },
    });

    expect(result).toEqual({
      success: false,
      errors: ["auth.redirectUri: Authorization code grant requires 'redirectUri'"],
    });
  });

  it('should require a password with a username', () => {
    const result = validateConfigSafe({ auth: { ...oauth2, username: 'test-user' } });

    expect(result).toEqual({
      success: false,
      errors: ["auth.password: Password grant requires 'password' when 'username' is set"],
    });
  });

  it('should bound retry settings', () => {
    const result = validateConfigSafe({ http: { retry: { maxAttempts: 0 } } });

    expect(result.success).toBe(false);
    expect(result.success ? [] : result.errors[0]).toMatch(/^http\.retry\.maxAttempts: /);
  });

  it('should accept a partial retry policy', () => {
    const result = validateConfigSafe({ http: { timeout: 1000, retry: { backoffFactor: 0.5 } } });

    expect(result).toEqual({
      success: true,
      data: { http: { timeout: 1000, retry: { backoffFactor: 0.5 } } },
    });
  });

  it('should accept transport options and drop agent instances', () => {
    const result = validateConfigSafe({
      http: {
        verifySsl: false,
        statusIgnore: [404],
        proxy: { host: 'proxy.internal', port: 3128 },
        httpsAgent: { keepAlive: true },
      },
    });

    expect(result).toEqual({
      success: true,
      data: {
        http: { verifySsl: false, statusIgnore: [404], proxy: { host: 'proxy.internal', port: 3128 } },
      },
    });
  });

  it('should reject ignored statuses and proxy ports out of range', () => {
    const statuses = validateConfigSafe({ http: { statusIgnore: [99] } });
    const proxy = validateConfigSafe({ http: { proxy: { host: 'proxy.internal', port: 0 } } });

    expect(statuses.success ? [] : statuses.errors[0]).toMatch(/^http\.statusIgnore\.0: /);
    expect(proxy.success ? [] : proxy.errors[0]).toMatch(/^http\.proxy/);
  });

  it('should reject an unknown log level', () => {
    expect(validateConfigSafe({ logging: { level: 'trace' } }).success).toBe(false);
  });
});
