// src/core/http/PipelineContext.ts

import type { CacheConfig, HttpResponse } from './types';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import { RateLimiter } from './RateLimiter';
import { ResponseCache } from './ResponseCache';
import type { Clock } from '../../utils/clock';

export class RequestCounter {
  private count = 0;

  increment(): number {
    this.count += 1;
    return this.count;
  }

  get value(): number {
    return this.count;
  }
}

export interface PipelineContextOptions {
  enableRateLimiting: boolean;
  cache?: CacheConfig;
  clock: Clock;
  logger: Logger;
  metrics?: MetricsCollector;
}

/**
 * Mutable state shared by every request of one client: limiter slots,
 * the response cache and the wire-attempt counter. Lives exactly as long
 * as the client that created it.
 */
export class PipelineContext {
  readonly counter = new RequestCounter();
  readonly rateLimiter: RateLimiter;
  readonly cache: ResponseCache<HttpResponse>;

  constructor(options: PipelineContextOptions) {
    this.rateLimiter = new RateLimiter(
      options.enableRateLimiting,
      options.logger,
      options.clock,
      options.metrics
    );
    this.cache = new ResponseCache<HttpResponse>(options.cache, options.clock);
  }
}
