// tests/unit/RetryHandler.test.ts

import { describe, it, expect, vi } from 'vitest';
import { RetryHandler } from '../../src/core/http/RetryHandler';
import type { AttemptResponse } from '../../src/core/http/RetryHandler';
import { BackoffScheduler, DEFAULT_RETRY_POLICY } from '../../src/core/http/BackoffScheduler';
import { Logger } from '../../src/observability/Logger';
import { MetricsCollector } from '../../src/observability/MetricsCollector';
import {
  NetworkError,
  RequestCancelledError,
  TransientNetworkError,
} from '../../src/utils/errors';
import { recordingSleep } from '../helpers/testDeps';

const context = { method: 'GET', url: 'https://api.example.com/items?page=2' };

function reply(status: number, headers: Record<string, string> = {}): AttemptResponse {
  return { status, headers, body: { kind: 'empty' } };
}

function createHandler(overrides: Partial<typeof DEFAULT_RETRY_POLICY> = {}) {
  const logger = new Logger({ silent: true });
  const metrics = new MetricsCollector({}, logger);
  const { sleep, delays } = recordingSleep();
  const scheduler = new BackoffScheduler({ ...DEFAULT_RETRY_POLICY, backoffFactor: 1, ...overrides });
  const handler = new RetryHandler(scheduler, logger, { sleep, metrics });
  return { handler, delays, metrics, logger };
}

describe('RetryHandler', () => {
  it('should return the last response after exhausting attempts', async () => {
    const { handler, delays } = createHandler();
    const task = vi.fn(async () => reply(503));

    const response = await handler.execute(task, context);

    expect(response.status).toBe(503);
    expect(response.attempts).toBe(4);
    expect(task).toHaveBeenCalledTimes(4);
    expect(delays).toEqual([2000, 4000]);
  });

  it('should pass the attempt number to the task', async () => {
    const { handler } = createHandler();
    const task = vi.fn(async (attempt: number) => reply(attempt < 3 ? 502 : 200));

    const response = await handler.execute(task, context);

    expect(response.status).toBe(200);
    expect(response.attempts).toBe(3);
    expect(task.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
  });

  it('should return non-retryable statuses immediately', async () => {
    const { handler, delays } = createHandler();
    const task = vi.fn(async () => reply(404));

    const response = await handler.execute(task, context);

    expect(response.attempts).toBe(1);
    expect(task).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
  });

  it('should retry transient network errors', async () => {
    const { handler } = createHandler();
    let calls = 0;
    const task = async () => {
      calls++;
      if (calls < 3) throw new TransientNetworkError('socket hang up');
      return reply(200);
    };

    const response = await handler.execute(task, context);

    expect(response.status).toBe(200);
    expect(response.attempts).toBe(3);
  });

  it('should rethrow the last transient error with the attempt count', async () => {
    const { handler } = createHandler();
    const task = vi.fn(async (): Promise<AttemptResponse> => {
      throw new TransientNetworkError('connection refused', { code: 'ECONNREFUSED' });
    });

    const error = await handler.execute(task, context).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransientNetworkError);
    expect(task).toHaveBeenCalledTimes(4);
    expect(error instanceof NetworkError ? error.details : undefined).toEqual({
      code: 'ECONNREFUSED',
      attempts: 4,
    });
  });

  it('should not retry errors the classifier rejects', async () => {
    const { handler } = createHandler();
    const task = vi.fn(async (): Promise<AttemptResponse> => {
      throw new NetworkError('unexpected');
    });

    await expect(handler.execute(task, context)).rejects.toThrow('unexpected');
    expect(task).toHaveBeenCalledTimes(1);
  });

  it('should wait for Retry-After instead of the computed delay', async () => {
    const { handler, delays } = createHandler();
    const task = vi
      .fn<(attempt: number) => Promise<AttemptResponse>>()
      .mockResolvedValueOnce(reply(429, { 'retry-after': '3' }))
      .mockResolvedValueOnce(reply(200));

    const response = await handler.execute(task, context);

    expect(response.attempts).toBe(2);
    expect(delays).toEqual([3000]);
  });

  it('should use a replaced classifier', async () => {
    const logger = new Logger({ silent: true });
    const handler = new RetryHandler(new BackoffScheduler(), logger, {
      shouldRetry: (outcome) => outcome.kind === 'response' && outcome.status === 404,
      sleep: recordingSleep().sleep,
    });
    const task = vi.fn(async () => reply(404));

    const response = await handler.execute(task, context);

    expect(response.attempts).toBe(4);
  });

  it('should stop before the first attempt when the signal is aborted', async () => {
    const { handler } = createHandler();
    const controller = new AbortController();
    controller.abort();
    const task = vi.fn(async () => reply(200));

    await expect(handler.execute(task, { ...context, signal: controller.signal })).rejects.toBeInstanceOf(
      RequestCancelledError
    );
    expect(task).not.toHaveBeenCalled();
  });

  it('should end a backoff wait as soon as the signal aborts', async () => {
    const logger = new Logger({ silent: true });
    const controller = new AbortController();
    // Never resolves: only the abort can end the wait
    const sleep = vi.fn<(ms: number) => Promise<void>>(() => {
      controller.abort();
      return new Promise<void>(() => undefined);
    });
    const handler = new RetryHandler(new BackoffScheduler(DEFAULT_RETRY_POLICY), logger, { sleep });
    const task = vi.fn(async () => reply(429, { 'retry-after': '30' }));

    const error = await handler
      .execute(task, { ...context, signal: controller.signal })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(RequestCancelledError);
    expect(error).toMatchObject({ details: { attempts: 1 } });
    expect(sleep).toHaveBeenCalledWith(30000);
    expect(task).toHaveBeenCalledTimes(1);
  });

  it('should count retries by reason and log without the query string', async () => {
    const { handler, metrics, logger } = createHandler();
    const warn = vi.spyOn(logger, 'warn');

    await handler.execute(async () => reply(503), context);

    const output = await metrics.getMetrics();
    expect(output).toContain('http_retries_total{method="GET",reason="503"} 3');
    expect(warn).toHaveBeenCalledTimes(3);
    expect(warn).toHaveBeenNthCalledWith(1, 'Retrying request', {
      method: 'GET',
      url: 'https://api.example.com/items',
      attempt: 2,
      delay: 0,
      status: 503,
    });
  });
});
