// src/core/http/RateLimiter.ts

import PQueue from 'p-queue';
import type { Endpoint, RateLimitCategory } from '../endpoints/types';
import type { CategoryStats, RateLimiterStats } from './types';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import { minDelayMs, requestsPerSecond } from '../endpoints/EndpointRegistry';
import { systemClock, type Clock } from '../../utils/clock';

interface CategoryLimiterState {
  lastRequestAt?: number;
  requestCount: number;
}

interface CategorySlot {
  readonly category: RateLimitCategory;
  readonly minDelayMs: number;
  readonly requestsPerSecond: number;
  // One task at a time: the check-sleep-record sequence is atomic per category
  readonly queue: PQueue;
  readonly state: CategoryLimiterState;
}

/**
 * Per-category gate enforcing a minimum gap between requests.
 *
 * Only the time since the last request is enforced. `requestCount` is kept
 * for observability and is never reset on a wall-clock boundary, so this is
 * not a token bucket.
 */
export class RateLimiter {
  private readonly slots: Record<RateLimitCategory, CategorySlot>;

  constructor(
    private readonly enabled: boolean,
    private readonly logger: Logger,
    private readonly clock: Clock = systemClock,
    private readonly metrics?: MetricsCollector
  ) {
    this.slots = {
      quote: this.createSlot('quote'),
      historical: this.createSlot('historical'),
      orders: this.createSlot('orders'),
      standard: this.createSlot('standard'),
    };
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  canRequestImmediately(endpoint: Endpoint): boolean {
    return this.delayUntilNextRequest(endpoint) === 0;
  }

  delayUntilNextRequest(endpoint: Endpoint): number {
    if (!this.enabled) return 0;
    return this.computeDelay(this.slots[endpoint.category]);
  }

  /**
   * Suspend until the endpoint's category may send again, then record the
   * request. Resolves with the milliseconds spent waiting.
   */
  async waitForRequest(endpoint: Endpoint): Promise<number> {
    if (!this.enabled) return 0;

    const slot = this.slots[endpoint.category];
    this.metrics?.recordGauge('rate_limit_queue_size', slot.queue.size + 1, {
      category: slot.category,
    });

    try {
      return await slot.queue.add(
        async () => {
          const delay = this.computeDelay(slot);

          if (delay > 0) {
            this.logger.debug('Rate limiting: waiting', {
              category: slot.category,
              operation: endpoint.operation,
              delayMs: delay,
            });
            this.metrics?.incrementCounter('rate_limit_hits', { category: slot.category });
            await this.clock.sleep(delay);
          }

          slot.state.lastRequestAt = this.clock.now();
          slot.state.requestCount += 1;

          this.metrics?.recordLatency('rate_limit_wait', delay, { category: slot.category });
          return delay;
        },
        { throwOnTimeout: true }
      );
    } finally {
      this.metrics?.recordGauge('rate_limit_queue_size', slot.queue.size, {
        category: slot.category,
      });
    }
  }

  getStats(): RateLimiterStats {
    return {
      enabled: this.enabled,
      categories: {
        quote: this.categoryStats(this.slots.quote),
        historical: this.categoryStats(this.slots.historical),
        orders: this.categoryStats(this.slots.orders),
        standard: this.categoryStats(this.slots.standard),
      },
    };
  }

  private createSlot(category: RateLimitCategory): CategorySlot {
    return {
      category,
      minDelayMs: minDelayMs(category),
      requestsPerSecond: requestsPerSecond(category),
      queue: new PQueue({ concurrency: 1 }),
      state: { requestCount: 0 },
    };
  }

  private computeDelay(slot: CategorySlot): number {
    const { lastRequestAt } = slot.state;
    if (lastRequestAt === undefined) return 0;

    const elapsed = this.clock.now() - lastRequestAt;
    if (elapsed >= slot.minDelayMs) return 0;

    // A clock stepping backwards never stretches the wait past one interval
    return Math.min(slot.minDelayMs, slot.minDelayMs - elapsed);
  }

  private categoryStats(slot: CategorySlot): CategoryStats {
    const { lastRequestAt, requestCount } = slot.state;
    const nextAvailableAt =
      lastRequestAt === undefined ? undefined : lastRequestAt + slot.minDelayMs;

    return {
      requestCount,
      requestsPerSecond: slot.requestsPerSecond,
      minDelayMs: slot.minDelayMs,
      lastRequestAt,
      nextAvailableAt,
      isAtLimit: nextAvailableAt !== undefined && nextAvailableAt > this.clock.now(),
      remainingCapacity: Math.max(0, slot.requestsPerSecond - requestCount),
    };
  }
}
