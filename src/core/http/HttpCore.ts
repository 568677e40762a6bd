// src/core/http/HttpCore.ts

import axios, { AxiosError } from 'axios';
import type { AxiosInstance, RawAxiosResponseHeaders, AxiosResponseHeaders } from 'axios';
import * as http from 'http';
import * as https from 'https';
import type { HttpConfig, HttpRequestConfig, HttpResponse, RetryPolicy, Sleep } from './types';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { Logger } from '../../observability/Logger';
import { BackoffScheduler } from './BackoffScheduler';
import { RetryHandler } from './RetryHandler';
import type { AttemptResponse } from './RetryHandler';
import { decodeBody } from './ResponseBody';
import {
  NetworkError,
  NetworkTimeoutError,
  RequestCancelledError,
  TransientNetworkError,
} from '../../utils/errors';
import { withHttpSpan, generateCorrelationId } from '../../observability/tracing';

export const DEFAULT_TIMEOUT_MS = 300_000;

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);
const CANCEL_CODES = new Set(['ERR_CANCELED']);

/**
 * Retrying transport. Every call goes through the RetryHandler; the final
 * response is returned whatever its status, so callers decide what an error
 * status means for them.
 */
export class HttpCore {
  private axiosInstance: AxiosInstance;
  private retryHandler: RetryHandler;
  private scheduler: BackoffScheduler;
  private metrics: MetricsCollector;
  private logger: Logger;
  private timeout: number;
  private userAgent: string;
  // Only the agents created here; caller-supplied ones are left to the caller
  private ownedAgents: Array<http.Agent | https.Agent> = [];

  constructor(
    config: HttpConfig,
    retryPolicy: RetryPolicy,
    metrics: MetricsCollector,
    logger: Logger,
    options: { sleep?: Sleep } = {}
  ) {
    this.metrics = metrics;
    this.logger = logger;
    this.timeout = config.timeout ?? DEFAULT_TIMEOUT_MS;
    this.userAgent = config.userAgent ?? 'grantline/0.1';
    this.scheduler = new BackoffScheduler(retryPolicy);
    this.retryHandler = new RetryHandler(this.scheduler, logger, {
      shouldRetry: config.shouldRetry,
      sleep: options.sleep,
      metrics,
    });

    const keepAlive = config.keepAlive ?? true;
    const httpAgent = config.httpAgent ?? this.own(new http.Agent({ keepAlive }));
    const httpsAgent =
      config.httpsAgent ??
      this.own(new https.Agent({ keepAlive, rejectUnauthorized: config.verifySsl ?? true }));

    if (config.verifySsl === false && !config.httpsAgent) {
      this.logger.warn('TLS certificate verification is disabled');
    }

    this.axiosInstance = axios.create({
      httpAgent,
      httpsAgent,
      ...(config.proxy !== undefined ? { proxy: config.proxy } : {}),
    });
  }

  /** Close pooled keep-alive sockets of the agents this transport created. */
  destroy(): void {
    for (const agent of this.ownedAgents) {
      agent.destroy();
    }
  }

  private own<T extends http.Agent>(agent: T): T {
    this.ownedAgents.push(agent);
    return agent;
  }

  get backoff(): BackoffScheduler {
    return this.scheduler;
  }

  async get(url: string, config: Omit<HttpRequestConfig, 'url' | 'method'> = {}): Promise<HttpResponse> {
    return this.request({ ...config, url, method: 'GET' });
  }

  async post(
    url: string,
    body: unknown,
    config: Omit<HttpRequestConfig, 'url' | 'method' | 'body'> = {}
  ): Promise<HttpResponse> {
    return this.request({ ...config, url, method: 'POST', body });
  }

  async request(config: HttpRequestConfig): Promise<HttpResponse> {
    const requestId = generateCorrelationId();
    const method = config.method ?? 'GET';

    this.logger.debug('HTTP request', {
      requestId,
      url: config.url.split('?')[0],
      method,
      headerKeys: Object.keys(config.headers ?? {}),
    });

    const headers: Record<string, string> = {
      'X-Request-ID': requestId,
      'User-Agent': this.userAgent,
      'Accept-Encoding': 'gzip, deflate',
      ...config.headers,
    };

    return withHttpSpan(method, config.url, async () => {
      const startTime = Date.now();

      try {
        const response = await this.retryHandler.execute(
          (attempt) => this.attempt(config, method, headers, attempt),
          { method, url: config.url, signal: config.signal }
        );

        this.metrics.incrementCounter('http_requests_total', {
          method,
          status: response.status.toString(),
        });
        this.metrics.recordLatency('http_request_duration', Date.now() - startTime, {
          method,
          status: response.status,
        });

        this.logger.debug('HTTP response', {
          requestId,
          status: response.status,
          attempts: response.attempts,
        });

        return response;
      } catch (error: unknown) {
        const code = error instanceof NetworkError ? error.code : 'error';
        this.metrics.incrementCounter('http_requests_total', { method, status: code });
        throw error;
      }
    });
  }

  private async attempt(
    config: HttpRequestConfig,
    method: string,
    headers: Record<string, string>,
    attempt: number
  ): Promise<AttemptResponse> {
    try {
      const axiosResponse = await this.axiosInstance.request<ArrayBuffer>({
        url: config.url,
        method,
        headers,
        params: config.query,
        data: config.body,
        timeout: config.timeout ?? this.timeout,
        maxRedirects: config.maxRedirects,
        signal: config.signal,
        responseType: 'arraybuffer',
        validateStatus: () => true,
      });

      const responseHeaders = this.toHeaderRecord(axiosResponse.headers);
      const bytes = Buffer.from(axiosResponse.data);

      return {
        status: axiosResponse.status,
        headers: responseHeaders,
        body: decodeBody(bytes, responseHeaders['content-type'], this.logger),
      };
    } catch (error: unknown) {
      throw this.transformError(error, method, config.url, attempt);
    }
  }

  private toHeaderRecord(
    headers: RawAxiosResponseHeaders | AxiosResponseHeaders
  ): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [key, value] of Object.entries(headers)) {
      if (typeof value === 'string') {
        record[key.toLowerCase()] = value;
      } else if (Array.isArray(value)) {
        record[key.toLowerCase()] = value.join(', ');
      }
    }
    return record;
  }

  private transformError(error: unknown, method: string, url: string, attempt: number): Error {
    const details = { method, url: url.split('?')[0], attempt };

    if (axios.isCancel(error) || (error instanceof AxiosError && CANCEL_CODES.has(error.code ?? ''))) {
      return new RequestCancelledError('Request cancelled', details);
    }

    if (error instanceof AxiosError) {
      const code = error.code ?? 'UNKNOWN';
      if (TIMEOUT_CODES.has(code)) {
        return new NetworkTimeoutError('Request timeout', { ...details, code });
      }
      // No response at all: reset, refused, DNS, redirect loop
      return new TransientNetworkError(`Network error: ${error.message}`, { ...details, code });
    }

    return new NetworkError('Network error', {
      ...details,
      cause: error instanceof Error ? error.message : String(error),
    });
  }
}
