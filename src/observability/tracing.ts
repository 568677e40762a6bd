/**
 * OpenTelemetry Tracing (Opt-in)
 *
 * Spans for HTTP attempts and token endpoint exchanges. Only the API package is
 * used here: the host application registers its own tracer provider. Without
 * one, or without `OTEL_ENABLED=1`, every helper runs the callback directly.
 */

import { trace, context, SpanStatusCode, SpanKind } from '@opentelemetry/api';
import type { Span, SpanOptions, Tracer } from '@opentelemetry/api';
import { v4 as uuidv4 } from 'uuid';

const TRACER_NAME = 'grantline';

export function isOTelEnabled(): boolean {
  return process.env.OTEL_ENABLED === '1' || process.env.OTEL_ENABLED === 'true';
}

export function getTracer(): Tracer | null {
  if (!isOTelEnabled()) {
    return null;
  }
  return trace.getTracer(TRACER_NAME);
}

/** Sent as `x-request-id` and attached to transport logs. */
export function generateCorrelationId(): string {
  return uuidv4();
}

/**
 * Run `fn` inside an active span. The span is ended whatever `fn` does; a
 * thrown error is recorded on it and rethrown unchanged.
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span | null) => Promise<T>,
  options: SpanOptions = {}
): Promise<T> {
  const tracer = getTracer();
  if (!tracer) {
    return fn(null);
  }

  return tracer.startActiveSpan(name, options, async (span) => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      span.recordException(error instanceof Error ? error : message);
      span.setStatus({ code: SpanStatusCode.ERROR, message });
      throw error;
    } finally {
      span.end();
    }
  });
}

/**
 * Client span for one logical request. The query string is dropped from the
 * URL attribute so callback codes never reach an exporter.
 */
export async function withHttpSpan<T>(
  method: string,
  url: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan(`HTTP ${method}`, fn, {
    kind: SpanKind.CLIENT,
    attributes: { 'http.method': method, 'http.url': url.split('?')[0] },
  });
}

/** Span around one token endpoint exchange ('acquire', 'refresh' or 'exchange'). */
export async function withGrantSpan<T>(
  operation: string,
  grant: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan(`OAuth2 ${operation}`, fn, {
    kind: SpanKind.CLIENT,
    attributes: { 'oauth.operation': operation, 'oauth.grant_type': grant },
  });
}

export function getCurrentSpan(): Span | undefined {
  if (!isOTelEnabled()) {
    return undefined;
  }
  return trace.getSpan(context.active());
}

export function addSpanEvent(name: string, attributes?: Record<string, string | number | boolean>): void {
  const span = getCurrentSpan();
  if (span) {
    span.addEvent(name, attributes);
  }
}
