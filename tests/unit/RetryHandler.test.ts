// tests/unit/RetryHandler.test.ts

import { describe, it, expect, beforeEach } from 'vitest';
import { RetryHandler, isSuccessStatus } from '../../src/core/http/RetryHandler';
import { RequestCounter } from '../../src/core/http/PipelineContext';
import { resolveEndpoint } from '../../src/core/endpoints/EndpointRegistry';
import { Logger } from '../../src/observability/Logger';
import { MetricsCollector } from '../../src/observability/MetricsCollector';
import {
  DataException,
  GeneralException,
  InputException,
  NetworkException,
  TokenException,
} from '../../src/utils/errors';
import type { RetryConfig } from '../../src/core/http/types';
import { FakeClock, failure, networkError, scripted, success, textResponse } from '../helpers/fakes';

const logger = new Logger({ silent: true });
const holdings = resolveEndpoint('holdings');
const placeOrder = resolveEndpoint('placeOrder');

const retryConfig: RetryConfig = {
  maxRetries: 3,
  baseDelay: 200,
  maxDelay: 5000,
  exponentialBackoff: true,
};

describe('RetryHandler', () => {
  let clock: FakeClock;
  let counter: RequestCounter;
  let handler: RetryHandler;

  beforeEach(() => {
    clock = new FakeClock();
    counter = new RequestCounter();
    handler = new RetryHandler(retryConfig, logger, counter, clock);
  });

  describe('backoffDelay', () => {
    it('should double from the base delay', () => {
      expect([0, 1, 2, 3].map((attempt) => handler.backoffDelay(attempt))).toEqual([
        200, 400, 800, 1600,
      ]);
    });

    it('should cap at the maximum delay', () => {
      expect(handler.backoffDelay(10)).toBe(5000);
    });

    it('should use a fixed delay without exponential backoff', () => {
      const fixed = new RetryHandler({ ...retryConfig, exponentialBackoff: false }, logger, counter, clock);
      expect([0, 1, 2].map((attempt) => fixed.backoffDelay(attempt))).toEqual([200, 200, 200]);
    });
  });

  it('should return the first successful response without waiting', async () => {
    const task = scripted(success({ ok: true }));

    const response = await handler.execute(holdings, task.attempt);

    expect(response.status).toBe(200);
    expect(task.calls()).toBe(1);
    expect(counter.value).toBe(1);
    expect(clock.sleeps).toEqual([]);
  });

  it('should retry server errors on reads with exponential backoff', async () => {
    const unavailable = textResponse(503, 'Service Unavailable');
    const task = scripted(unavailable, unavailable, unavailable, success([]));

    const response = await handler.execute(holdings, task.attempt);

    expect(response.status).toBe(200);
    expect(task.calls()).toBe(4);
    expect(counter.value).toBe(4);
    expect(clock.sleeps).toEqual([200, 400, 800]);
  });

  it('should throw the last error once retries are exhausted', async () => {
    const task = scripted(textResponse(500, 'Internal Server Error'));

    const error = await handler.execute(holdings, task.attempt).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DataException);
    expect(error).toMatchObject({ status: 500, message: 'Internal Server Error' });
    expect(task.calls()).toBe(4);
    expect(clock.sleeps).toEqual([200, 400, 800]);
  });

  it('should not retry a non-retryable error', async () => {
    const task = scripted(failure(400, 'InputException', 'Invalid `quantity`'), success([]));

    await expect(handler.execute(holdings, task.attempt)).rejects.toBeInstanceOf(InputException);
    expect(task.calls()).toBe(1);
    expect(clock.sleeps).toEqual([]);
  });

  it('should not retry an expired session', async () => {
    const task = scripted(failure(403, 'TokenException', 'Session expired'), success([]));

    await expect(handler.execute(holdings, task.attempt)).rejects.toBeInstanceOf(TokenException);
    expect(task.calls()).toBe(1);
  });

  it('should retry transport failures on reads', async () => {
    const task = scripted(networkError('ECONNRESET', 'socket hang up'), success([]));

    const response = await handler.execute(holdings, task.attempt);

    expect(response.status).toBe(200);
    expect(clock.sleeps).toEqual([200]);
  });

  describe('writes', () => {
    it('should not replay an order after a server error', async () => {
      const task = scripted(failure(500, 'GeneralException', 'Order status unknown'), success({}));

      await expect(handler.execute(placeOrder, task.attempt)).rejects.toBeInstanceOf(GeneralException);
      expect(task.calls()).toBe(1);
      expect(clock.sleeps).toEqual([]);
    });

    it('should not replay an order after a dropped connection', async () => {
      const task = scripted(networkError('ETIMEDOUT', 'timeout'), success({}));

      await expect(handler.execute(placeOrder, task.attempt)).rejects.toBeInstanceOf(NetworkException);
      expect(task.calls()).toBe(1);
    });

    it('should replay an order rejected with 429', async () => {
      const task = scripted(textResponse(429, 'Too many requests'), success({ order_id: '1' }));

      const response = await handler.execute(placeOrder, task.attempt);

      expect(response.status).toBe(200);
      expect(task.calls()).toBe(2);
      expect(clock.sleeps).toEqual([200]);
    });
  });

  it('should make a single attempt when maxRetries is zero', async () => {
    const once = new RetryHandler({ ...retryConfig, maxRetries: 0 }, logger, counter, clock);
    const task = scripted(textResponse(503, 'Service Unavailable'), success([]));

    await expect(once.execute(holdings, task.attempt)).rejects.toBeInstanceOf(DataException);
    expect(task.calls()).toBe(1);
  });

  it('should count retries in metrics', async () => {
    const metrics = new MetricsCollector();
    const measured = new RetryHandler(retryConfig, logger, counter, clock, metrics);
    const task = scripted(textResponse(502, 'Bad Gateway'), success([]));

    await measured.execute(holdings, task.attempt);

    expect(await metrics.getMetrics()).toContain(
      'http_retries_total{category="standard",kind="DataException"} 1'
    );
  });

  describe('shouldRetry', () => {
    it('should follow idempotency for retryable errors', () => {
      const serverError = new DataException('Bad Gateway', { status: 502 });
      const throttled = new NetworkException('Too many requests', { status: 429 });

      expect(handler.shouldRetry(serverError, holdings)).toBe(true);
      expect(handler.shouldRetry(serverError, placeOrder)).toBe(false);
      expect(handler.shouldRetry(throttled, placeOrder)).toBe(true);
      expect(handler.shouldRetry(new InputException('bad', { status: 400 }), holdings)).toBe(false);
    });
  });

  it('should treat 2xx as success', () => {
    expect(isSuccessStatus(200)).toBe(true);
    expect(isSuccessStatus(204)).toBe(true);
    expect(isSuccessStatus(304)).toBe(false);
    expect(isSuccessStatus(199)).toBe(false);
  });
});
