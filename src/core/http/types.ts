// src/core/http/types.ts

import type { Agent as HttpAgent } from 'http';
import type { Agent as HttpsAgent } from 'https';
import type { AxiosProxyConfig } from 'axios';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH';

export interface HttpRequestConfig {
  url: string;
  method?: HttpMethod;
  headers?: Record<string, string>;
  query?: Record<string, string | number | boolean>;
  body?: unknown;
  timeout?: number; // per attempt, milliseconds
  maxRedirects?: number;
  signal?: AbortSignal;
}

/**
 * Decoded response body. Which branch is produced depends on the declared
 * content type and on whether the bytes parse; see `decodeBody`.
 */
export type ResponseBody =
  | { kind: 'json'; value: unknown }
  | { kind: 'form'; value: Record<string, string> }
  | { kind: 'raw'; bytes: Buffer; contentType?: string }
  | { kind: 'empty' };

export interface HttpResponse {
  body: ResponseBody;
  status: number;
  headers: Record<string, string>;
  attempts: number;
}

export interface RetryPolicy {
  maxAttempts: number; // total attempts, first one included
  backoffFactor: number; // seconds
  retryableStatusCodes: number[];
  maxBackoffSeconds: number;
}

/** What a single attempt produced, as seen by the retry classifier. */
export type AttemptOutcome =
  | { kind: 'response'; status: number; headers: Record<string, string> }
  | { kind: 'error'; error: unknown };

export type RetryClassifier = (outcome: AttemptOutcome) => boolean;

export type Sleep = (ms: number) => Promise<void>;

export interface HttpConfig {
  timeout?: number;
  keepAlive?: boolean;
  userAgent?: string;
  shouldRetry?: RetryClassifier;
  /** Check the server certificate on HTTPS. Defaults to true; ignored when `httpsAgent` is given. */
  verifySsl?: boolean;
  // Caller-owned agents are used as given and never destroyed here
  httpAgent?: HttpAgent;
  httpsAgent?: HttpsAgent;
  /** Forward proxy for every request. `false` also ignores proxy environment variables. */
  proxy?: AxiosProxyConfig | false;
}
