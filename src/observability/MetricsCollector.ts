// src/observability/MetricsCollector.ts

import { Registry, Counter, Histogram, Gauge } from 'prom-client';
import * as http from 'http';
import type { Logger } from './Logger';

export interface MetricsConfig {
  enabled?: boolean;
  port?: number;
  path?: string;
}

const MAX_PORT = 9200;

export class MetricsCollector {
  private registry: Registry;
  private counters: Map<string, Counter> = new Map();
  private histograms: Map<string, Histogram> = new Map();
  private gauges: Map<string, Gauge> = new Map();
  private server?: http.Server;
  private logger?: Logger;

  constructor(config: MetricsConfig = {}, logger?: Logger) {
    this.logger = logger;
    this.registry = new Registry();

    if (config.enabled !== false) {
      this.initializeMetrics();

      if (config.port) {
        this.exposeMetrics(config.port, config.path ?? '/metrics');
      }
    }
  }

  private initializeMetrics(): void {
    // Wire attempts, retries included
    this.counters.set(
      'http_requests_total',
      new Counter({
        name: 'http_requests_total',
        help: 'Total HTTP requests',
        labelNames: ['category', 'method', 'status'],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'http_request_duration',
      new Histogram({
        name: 'http_request_duration_seconds',
        help: 'Dispatch duration including retries and rate-limit waits',
        labelNames: ['category', 'status'],
        buckets: [0.1, 0.5, 1, 2, 5],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'http_errors',
      new Counter({
        name: 'http_errors_total',
        help: 'Dispatches that ended in a classified error',
        labelNames: ['category', 'kind'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'http_retries',
      new Counter({
        name: 'http_retries_total',
        help: 'Retries after a transient failure',
        labelNames: ['category', 'kind'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'http_cache_hits',
      new Counter({
        name: 'http_cache_hits_total',
        help: 'Responses served from the response cache',
        labelNames: ['operation'],
        registers: [this.registry],
      })
    );

    // Rate limiting metrics
    this.gauges.set(
      'rate_limit_queue_size',
      new Gauge({
        name: 'rate_limit_queue_size',
        help: 'Requests waiting on a category gate',
        labelNames: ['category'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'rate_limit_hits',
      new Counter({
        name: 'rate_limit_hits_total',
        help: 'Requests delayed by the rate limiter',
        labelNames: ['category'],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'rate_limit_wait',
      new Histogram({
        name: 'rate_limit_wait_seconds',
        help: 'Time spent waiting on a category gate',
        labelNames: ['category'],
        buckets: [0, 0.05, 0.1, 0.35, 1],
        registers: [this.registry],
      })
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

  recordGauge(name: string, value: number, labels: Record<string, string | number>): void {
    const gauge = this.gauges.get(name);
    gauge?.set(labels, value);
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  private exposeMetrics(port: number, path: string): void {
    if (port > MAX_PORT) {
      this.logger?.error('Unable to find available port for metrics server');
      return;
    }

    const server = http.createServer((req, res) => {
      if (req.url !== path) {
        res.statusCode = 404;
        res.end('Not Found');
        return;
      }
      this.getMetrics()
        .then((body) => {
          res.setHeader('Content-Type', this.registry.contentType);
          res.end(body);
        })
        .catch((error: unknown) => {
          this.logger?.error('Failed to render metrics', {
            error: error instanceof Error ? error.message : String(error),
          });
          res.statusCode = 500;
          res.end();
        });
    });

    server.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code === 'EADDRINUSE') {
        this.logger?.warn(`Port ${port} in use, trying next available port`);
        server.close();
        this.exposeMetrics(port + 1, path);
      } else {
        this.logger?.error('MetricsCollector server error', { error: error.message });
      }
    });

    server.listen(port, () => {
      this.logger?.info(`Metrics exposed on http://localhost:${port}${path}`);
    });

    this.server = server;
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;

    this.server = undefined;
    return new Promise((resolve) => {
      server.close(() => resolve());
    });
  }
}
