// src/core/http/RetryHandler.ts

import type { AttemptOutcome, HttpResponse, RetryClassifier, Sleep } from './types';
import type { BackoffScheduler } from './BackoffScheduler';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import { addSpanEvent } from '../../observability/tracing';
import { RequestCancelledError, SDKError } from '../../utils/errors';

export type AttemptResponse = Omit<HttpResponse, 'attempts'>;

export interface RetryContext {
  method: string;
  url: string;
  signal?: AbortSignal;
}

export interface RetryHandlerOptions {
  shouldRetry?: RetryClassifier;
  sleep?: Sleep;
  metrics?: MetricsCollector;
}

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export class RetryHandler {
  private shouldRetry: RetryClassifier;
  private sleep: Sleep;

  constructor(
    private scheduler: BackoffScheduler,
    private logger: Logger,
    private options: RetryHandlerOptions = {}
  ) {
    this.shouldRetry = options.shouldRetry ?? ((outcome) => scheduler.shouldRetry(outcome));
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Run `task` until it yields a non-retryable outcome or the attempt budget is
   * spent. The last response is returned as is, whatever its status; the last
   * error is rethrown in its own class with the attempt count in its details.
   */
  async execute(
    task: (attempt: number) => Promise<AttemptResponse>,
    context: RetryContext
  ): Promise<HttpResponse> {
    const maxAttempts = Math.max(1, this.scheduler.maxAttempts);
    let previous: AttemptOutcome | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (attempt > 1) {
        const delay =
          (previous && this.scheduler.retryAfterDelay(previous)) ??
          this.scheduler.delayBefore(attempt);

        this.logger.warn('Retrying request', {
          method: context.method,
          url: stripQuery(context.url),
          attempt,
          delay,
          ...(previous?.kind === 'response'
            ? { status: previous.status }
            : { error: errorMessage(previous?.error) }),
        });
        this.options.metrics?.incrementCounter('http_retries_total', {
          method: context.method,
          reason: previous?.kind === 'response' ? String(previous.status) : 'network',
        });
        addSpanEvent('retry', { attempt, delay });

        if (delay > 0) {
          await this.sleepUnlessAborted(delay, context.signal, attempt);
        }
      }

      if (context.signal?.aborted) {
        throw new RequestCancelledError('Request cancelled', { attempts: attempt - 1 });
      }

      let response: AttemptResponse;
      try {
        response = await task(attempt);
      } catch (error: unknown) {
        previous = { kind: 'error', error };
        if (attempt === maxAttempts || !this.shouldRetry(previous)) {
          throw withAttempts(error, attempt);
        }
        continue;
      }

      previous = { kind: 'response', status: response.status, headers: response.headers };
      if (attempt === maxAttempts || !this.shouldRetry(previous)) {
        return { ...response, attempts: attempt };
      }
    }

    // maxAttempts >= 1, so the loop always returns or throws
    throw new Error('Retry loop exited without an outcome');
  }

  /** Backoff wait that ends early, with RequestCancelledError, once `signal` aborts. */
  private async sleepUnlessAborted(
    delay: number,
    signal: AbortSignal | undefined,
    attempt: number
  ): Promise<void> {
    if (!signal) {
      await this.sleep(delay);
      return;
    }

    const cancelled = (): RequestCancelledError =>
      new RequestCancelledError('Request cancelled', { attempts: attempt - 1 });
    if (signal.aborted) throw cancelled();

    let onAbort: (() => void) | undefined;
    const aborted = new Promise<never>((_, reject) => {
      onAbort = () => reject(cancelled());
      signal.addEventListener('abort', onAbort, { once: true });
    });

    try {
      await Promise.race([this.sleep(delay), aborted]);
    } finally {
      if (onAbort) signal.removeEventListener('abort', onAbort);
    }
  }
}

function withAttempts(error: unknown, attempts: number): unknown {
  if (error instanceof SDKError) {
    error.details = { ...error.details, attempts };
  }
  return error;
}

function errorMessage(error: unknown): string | undefined {
  if (error === undefined) return undefined;
  return error instanceof Error ? error.message : String(error);
}

function stripQuery(url: string): string {
  return url.split('?')[0];
}
