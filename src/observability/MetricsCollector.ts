// src/observability/MetricsCollector.ts

import { Registry, Counter, Histogram } from 'prom-client';
import type { Logger } from './Logger';

export interface MetricsConfig {
  enabled?: boolean;
}

export class MetricsCollector {
  private registry: Registry;
  private counters: Map<string, Counter> = new Map();
  private histograms: Map<string, Histogram> = new Map();
  private logger?: Logger;

  constructor(config: MetricsConfig = {}, logger?: Logger) {
    this.logger = logger;
    this.registry = new Registry();

    if (config.enabled !== false) {
      this.initializeMetrics();
    } else {
      this.logger?.debug('Metrics disabled');
    }
  }

  private initializeMetrics(): void {
    // Transport
    this.addCounter('http_requests_total', 'Total HTTP requests by final status', ['method', 'status']);
    this.addCounter('http_retries_total', 'HTTP attempts that were retried', ['method', 'reason']);
    this.addHistogram(
      'http_request_duration',
      'HTTP request duration including retries',
      ['method', 'status'],
      [0.1, 0.5, 1, 2, 5, 30, 120]
    );

    // Token lifecycle
    this.addCounter('token_requests_total', 'Token endpoint exchanges', ['grant', 'operation', 'status']);
    this.addHistogram(
      'token_request_duration',
      'Token endpoint exchange duration',
      ['grant', 'operation', 'status'],
      [0.1, 0.3, 0.5, 1, 2, 5]
    );
    this.addCounter(
      'token_flight_joins',
      'Header requests that joined an in-flight token request',
      ['grant']
    );
  }

  // Counter names get the conventional _total suffix when the key lacks it
  private addCounter(key: string, help: string, labelNames: string[]): void {
    const name = key.endsWith('_total') ? key : `${key}_total`;
    this.counters.set(key, new Counter({ name, help, labelNames, registers: [this.registry] }));
  }

  private addHistogram(key: string, help: string, labelNames: string[], buckets: number[]): void {
    this.histograms.set(
      key,
      new Histogram({ name: `${key}_seconds`, help, labelNames, buckets, registers: [this.registry] })
    );
  }

  incrementCounter(name: string, labels: Record<string, string | number>): void {
    const counter = this.counters.get(name);
    counter?.inc(labels);
  }

  recordLatency(name: string, durationMs: number, labels: Record<string, string | number>): void {
    const histogram = this.histograms.get(name);
    histogram?.observe(labels, durationMs / 1000);
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  get contentType(): string {
    return this.registry.contentType;
  }
}
