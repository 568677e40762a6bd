// src/observability/Logger.ts

import winston from 'winston';

export interface LoggerConfig {
  level?: 'debug' | 'info' | 'warn' | 'error';
  format?: 'json' | 'pretty';
  silent?: boolean;
}

const REDACTED = '[REDACTED]';

// Token material, credentials and the one-shot values of the authorization redirect
const SENSITIVE_KEYS = new Set([
  'accesstoken',
  'access_token',
  'refreshtoken',
  'refresh_token',
  'idtoken',
  'id_token',
  'clientsecret',
  'client_secret',
  'password',
  'encryptionkey',
  'authorization',
  'code',
  'state',
]);

export class Logger {
  private logger: winston.Logger;

  constructor(config: LoggerConfig = {}) {
    const format =
      config.format === 'pretty'
        ? winston.format.combine(winston.format.colorize(), winston.format.simple())
        : winston.format.json();

    this.logger = winston.createLogger({
      level: config.level ?? 'info',
      format,
      silent: config.silent ?? false,
      transports: [new winston.transports.Console()],
    });
  }

  private redactSensitive(obj: object, depth = 0): Record<string, unknown> {
    const redacted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      redacted[key] = SENSITIVE_KEYS.has(key.toLowerCase())
        ? REDACTED
        : this.redactValue(value, depth + 1);
    }
    return redacted;
  }

  private redactValue(value: unknown, depth: number): unknown {
    if (!value || typeof value !== 'object') return value;
    if (value instanceof Date || value instanceof Error) return value;
    if (depth > 4) return '[Truncated]';
    if (Array.isArray(value)) return value.map((item) => this.redactValue(item, depth + 1));
    return this.redactSensitive(value, depth);
  }

  private sanitize(meta?: Record<string, unknown>): Record<string, unknown> {
    return meta ? this.redactSensitive(meta) : {};
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, this.sanitize(meta));
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, this.sanitize(meta));
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, this.sanitize(meta));
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, this.sanitize(meta));
  }

  log(level: string, message: string, meta?: Record<string, unknown>): void {
    this.logger.log(level, message, this.sanitize(meta));
  }
}
