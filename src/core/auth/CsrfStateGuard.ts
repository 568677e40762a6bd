// src/core/auth/CsrfStateGuard.ts

import * as crypto from 'crypto';
import { generators } from 'openid-client';
import type { Logger } from '../../observability/Logger';
import { StateMismatchError } from '../../utils/errors';

const DEFAULT_STATE_TTL_MS = 600000; // 10 minutes

interface PendingState {
  digest: Buffer;
  createdAt: number;
}

/**
 * One pending `state` per coordinator. Issuing a new state supersedes the
 * previous one; a successful match consumes it.
 */
export class CsrfStateGuard {
  private pending?: PendingState;

  constructor(
    private logger: Logger,
    private ttlMs: number = DEFAULT_STATE_TTL_MS
  ) {}

  /** 32 random bytes, base64url encoded. */
  issue(): string {
    const state = generators.state();
    if (this.pending) {
      this.logger.debug('Superseding pending authorization state');
    }
    this.pending = { digest: digest(state), createdAt: Date.now() };
    return state;
  }

  /**
   * @throws {StateMismatchError} If nothing is pending, the pending state is
   * stale, or `received` does not match it
   */
  consume(received: string): void {
    const pending = this.pending;

    if (!pending) {
      this.logger.warn('Authorization callback without a pending state');
      throw new StateMismatchError('No authorization request is pending for this state');
    }

    if (this.isStale(pending)) {
      this.pending = undefined;
      this.logger.warn('Authorization state expired');
      throw new StateMismatchError('Authorization state expired, restart authorization flow');
    }

    // Digests have equal length, so the comparison time does not depend on input
    if (!crypto.timingSafeEqual(pending.digest, digest(received))) {
      this.logger.warn('Authorization state mismatch, possible CSRF attempt');
      throw new StateMismatchError();
    }

    this.pending = undefined;
  }

  private isStale(pending: PendingState): boolean {
    return Date.now() - pending.createdAt > this.ttlMs;
  }
}

function digest(value: string): Buffer {
  return crypto.createHash('sha256').update(value, 'utf8').digest();
}
