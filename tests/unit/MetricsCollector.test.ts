// tests/unit/MetricsCollector.test.ts

import { describe, it, expect } from 'vitest';
import { MetricsCollector } from '../../src/observability/MetricsCollector';

describe('MetricsCollector', () => {
  it('should count labelled events', async () => {
    const metrics = new MetricsCollector();

    metrics.incrementCounter('token_requests_total', {
      grant: 'password',
      operation: 'acquire',
      status: '200',
    });
    metrics.incrementCounter('token_requests_total', {
      grant: 'password',
      operation: 'acquire',
      status: '200',
    });

    expect(await metrics.getMetrics()).toContain(
      'token_requests_total{grant="password",operation="acquire",status="200"} 2'
    );
  });

  it('should record latency in seconds', async () => {
    const metrics = new MetricsCollector();

    metrics.recordLatency('http_request_duration', 250, { method: 'GET', status: 200 });

    const output = await metrics.getMetrics();
    expect(output).toContain('http_request_duration_seconds_sum{method="GET",status="200"} 0.25');
    expect(output).toContain('http_request_duration_seconds_count{method="GET",status="200"} 1');
  });

  it('should keep registries separate per collector', async () => {
    const first = new MetricsCollector();
    const second = new MetricsCollector();

    first.incrementCounter('token_flight_joins', { grant: 'client_credentials' });

    expect(await first.getMetrics()).toContain('token_flight_joins_total{grant="client_credentials"} 1');
    expect(await second.getMetrics()).not.toContain('token_flight_joins_total{grant=');
  });

  it('should ignore unknown metric names', () => {
    const metrics = new MetricsCollector();

    expect(() => metrics.incrementCounter('unknown_total', {})).not.toThrow();
    expect(() => metrics.recordLatency('unknown', 10, {})).not.toThrow();
  });

  it('should register nothing when disabled', async () => {
    const metrics = new MetricsCollector({ enabled: false });

    metrics.incrementCounter('http_requests_total', { method: 'GET', status: '200' });

    expect(await metrics.getMetrics()).not.toContain('http_requests_total');
  });

  it('should expose the Prometheus content type', () => {
    expect(new MetricsCollector().contentType).toContain('text/plain');
  });
});
