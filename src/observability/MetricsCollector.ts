// src/observability/MetricsCollector.ts

import { Registry, Counter, Histogram } from 'prom-client';

export interface MetricsConfig {
  enabled?: boolean;
  prefix?: string;
}

export class MetricsCollector {
  private registry: Registry;
  private counters: Map<string, Counter> = new Map();
  private histograms: Map<string, Histogram> = new Map();

  constructor(config: MetricsConfig = {}) {
    this.registry = new Registry();

    if (config.enabled !== false) {
      this.initializeMetrics(config.prefix ?? '');
    }
  }

  private initializeMetrics(prefix: string): void {
    this.counters.set(
      'http_requests_total',
      new Counter({
        name: `${prefix}http_requests_total`,
        help: 'Outbound HTTP calls, one per attempt',
        labelNames: ['host', 'method', 'status'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'http_retries',
      new Counter({
        name: `${prefix}http_retries_total`,
        help: 'Retries scheduled by the retry policy',
        labelNames: ['host', 'reason'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'http_errors',
      new Counter({
        name: `${prefix}http_errors_total`,
        help: 'Requests that ended in a terminal failure',
        labelNames: ['host', 'code'],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'http_request_duration',
      new Histogram({
        name: `${prefix}http_request_duration_seconds`,
        help: 'HTTP request duration including retries',
        labelNames: ['host', 'status'],
        buckets: [0.1, 0.5, 1, 2, 5, 10],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'rate_limit_wait',
      new Histogram({
        name: `${prefix}rate_limit_wait_seconds`,
        help: 'Time spent waiting for the rate limiter',
        labelNames: ['host'],
        buckets: [0.01, 0.05, 0.1, 0.5, 1, 5],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'bytes_streamed',
      new Counter({
        name: `${prefix}bytes_streamed_total`,
        help: 'Bytes streamed to disk',
        labelNames: ['host'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'retrievals_total',
      new Counter({
        name: `${prefix}retrievals_total`,
        help: 'Retrievals by the source that satisfied them',
        labelNames: ['kind', 'source'],
        registers: [this.registry],
      })
    );
  }

  incrementCounter(name: string, labels: Record<string, string | number>, value = 1): void {
    const counter = this.counters.get(name);
    counter?.inc(labels, value);
  }

  recordLatency(name: string, durationMs: number, labels: Record<string, string | number>): void {
    const histogram = this.histograms.get(name);
    histogram?.observe(labels, durationMs / 1000);
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }
}
