// src/core/http/BackoffScheduler.ts

import type { AttemptOutcome, RetryPolicy } from './types';
import { TransientNetworkError } from '../../utils/errors';

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 4,
  backoffFactor: 0.9,
  retryableStatusCodes: [408, 425, 429, 500, 502, 503, 504],
  maxBackoffSeconds: 120,
};

// Statuses whose Retry-After header is honoured
const RETRY_AFTER_STATUS_CODES = new Set([429, 503]);

/**
 * Pure retry arithmetic: how long to wait before an attempt and whether an
 * outcome deserves another one. Holds no state between requests.
 */
export class BackoffScheduler {
  constructor(private policy: RetryPolicy = DEFAULT_RETRY_POLICY) {}

  get maxAttempts(): number {
    return this.policy.maxAttempts;
  }

  /**
   * Delay in milliseconds before `attempt` (1-based). The first retry is
   * immediate; after that the delay doubles from `backoffFactor * 2`.
   */
  delayBefore(attempt: number): number {
    if (attempt <= 2) return 0;
    const seconds = this.policy.backoffFactor * Math.pow(2, attempt - 2);
    return this.clamp(seconds * 1000);
  }

  /**
   * Delay requested by the server through Retry-After (seconds or HTTP date),
   * or undefined when the outcome carries none.
   */
  retryAfterDelay(outcome: AttemptOutcome, now: number = Date.now()): number | undefined {
    if (outcome.kind !== 'response' || !RETRY_AFTER_STATUS_CODES.has(outcome.status)) {
      return undefined;
    }

    const retryAfter = outcome.headers['retry-after'];
    if (!retryAfter) return undefined;

    if (/^\d+$/.test(retryAfter.trim())) {
      return this.clamp(parseInt(retryAfter, 10) * 1000);
    }

    const retryDate = Date.parse(retryAfter);
    if (isNaN(retryDate)) return undefined;
    return this.clamp(Math.max(0, retryDate - now));
  }

  isRetryableStatus(status: number): boolean {
    return this.policy.retryableStatusCodes.includes(status);
  }

  shouldRetry(outcome: AttemptOutcome): boolean {
    if (outcome.kind === 'response') {
      return this.isRetryableStatus(outcome.status);
    }
    return outcome.error instanceof TransientNetworkError;
  }

  private clamp(ms: number): number {
    return Math.min(ms, this.policy.maxBackoffSeconds * 1000);
  }
}
