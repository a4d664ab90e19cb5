// src/observability/MetricsCollector.ts

import { Registry, Counter, Histogram } from 'prom-client';

export interface MetricsConfig {
  enabled?: boolean;
}

type Labels = Record<string, string | number>;

export class MetricsCollector {
  private registry: Registry;
  private counters: Map<string, Counter> = new Map();
  private histograms: Map<string, Histogram> = new Map();

  constructor(config: MetricsConfig = {}) {
    // Per-instance registry so several clients in one process keep separate series
    this.registry = new Registry();

    if (config.enabled !== false) {
      this.initializeMetrics();
    }
  }

  private initializeMetrics(): void {
    // HTTP metrics
    this.counters.set(
      'http_requests_total',
      new Counter({
        name: 'zenmoney_http_requests_total',
        help: 'Total HTTP requests',
        labelNames: ['endpoint', 'method', 'status'],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'http_request_duration',
      new Histogram({
        name: 'zenmoney_http_request_duration_seconds',
        help: 'HTTP request duration',
        labelNames: ['endpoint', 'status'],
        buckets: [0.1, 0.5, 1, 2, 5],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'http_errors',
      new Counter({
        name: 'zenmoney_http_errors_total',
        help: 'HTTP errors',
        labelNames: ['endpoint', 'status'],
        registers: [this.registry],
      })
    );

    // Token metrics
    this.counters.set(
      'token_requests_total',
      new Counter({
        name: 'zenmoney_token_requests_total',
        help: 'Token endpoint calls by grant type',
        labelNames: ['grant', 'status'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'token_refresh_dedup',
      new Counter({
        name: 'zenmoney_token_refresh_dedup_total',
        help: 'Refresh requests that joined an in-flight refresh',
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'token_request_duration',
      new Histogram({
        name: 'zenmoney_token_request_duration_seconds',
        help: 'Token endpoint call duration',
        labelNames: ['grant', 'status'],
        buckets: [0.1, 0.3, 0.5, 1, 2],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'api_retries_total',
      new Counter({
        name: 'zenmoney_api_retries_total',
        help: 'Requests retried after a token refresh',
        labelNames: ['endpoint'],
        registers: [this.registry],
      })
    );
  }

  incrementCounter(name: string, labels: Labels = {}): void {
    const counter = this.counters.get(name);
    counter?.inc(labels);
  }

  recordLatency(name: string, durationMs: number, labels: Labels = {}): void {
    const histogram = this.histograms.get(name);
    histogram?.observe(labels, durationMs / 1000);
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }
}
