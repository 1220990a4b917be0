// src/core/http/RetryHandler.ts

import type { RetryConfig } from './types';
import type { Endpoint } from '../endpoints/types';
import type { TransportResponse } from './Transport';
import type { RequestCounter } from './PipelineContext';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import { isIdempotent } from '../endpoints/EndpointRegistry';
import { classify, classifyTransportError } from '../errors/ErrorClassifier';
import { GeneralException, type ClassifiedError } from '../../utils/errors';
import { systemClock, type Clock } from '../../utils/clock';
import { addSpanEvent } from '../../observability/tracing';

export type AttemptFn = (attempt: number) => Promise<TransportResponse>;

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

export class RetryHandler {
  constructor(
    private config: RetryConfig,
    private logger: Logger,
    private counter: RequestCounter,
    private clock: Clock = systemClock,
    private metrics?: MetricsCollector
  ) {}

  /**
   * Delay before the retry that follows `attempt` (zero-based).
   */
  backoffDelay(attempt: number): number {
    if (!this.config.exponentialBackoff) {
      return this.config.baseDelay;
    }
    return Math.min(this.config.baseDelay * Math.pow(2, attempt), this.config.maxDelay);
  }

  /**
   * Run one logical call, retrying transient failures.
   *
   * Resolves with the first 2xx response. Rejects with the classified error
   * of the last attempt once it is not retryable or the budget is spent.
   */
  async execute(endpoint: Endpoint, task: AttemptFn): Promise<TransportResponse> {
    let lastError: ClassifiedError | undefined;

    for (let attempt = 0; attempt <= this.config.maxRetries; attempt++) {
      this.counter.increment();

      let error: ClassifiedError;
      try {
        const response = await task(attempt);
        if (isSuccessStatus(response.status)) {
          return response;
        }
        error = classify(response.status, response.body);
      } catch (thrown) {
        error = classifyTransportError(thrown);
      }
      lastError = error;

      if (attempt === this.config.maxRetries || !this.shouldRetry(error, endpoint)) {
        throw error;
      }

      const delay = this.backoffDelay(attempt);

      this.logger.warn('Retrying request', {
        operation: endpoint.operation,
        category: endpoint.category,
        attempt: attempt + 1,
        delay,
        status: error.status,
        kind: error.kind,
      });
      addSpanEvent('retry', { attempt: attempt + 1, delay, kind: error.kind });
      this.metrics?.incrementCounter('http_retries', {
        category: endpoint.category,
        kind: error.kind,
      });

      await this.clock.sleep(delay);
    }

    throw lastError ?? new GeneralException('No request attempt was made');
  }

  /**
   * Writes are replayed only after a 429, which the remote rejects before
   * processing; a 5xx or a dropped connection may follow an executed order.
   */
  shouldRetry(error: ClassifiedError, endpoint: Endpoint): boolean {
    if (!error.isRetryable) return false;
    if (isIdempotent(endpoint)) return true;
    return error.isRateLimited;
  }
}
