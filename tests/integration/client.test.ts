/**
 * Client Integration Tests
 *
 * Drives the public client over the real axios transport with nock
 * standing in for the API host. Retry delays are shortened to keep the
 * suite fast; rate-limit gaps run on the system clock.
 */

import { describe, it, expect, beforeAll, afterAll, afterEach, vi } from 'vitest';
import nock from 'nock';
import { KiteClient } from '../../src/client';
import { Logger } from '../../src/observability/Logger';
import { GeneralException, TokenException, type ClassifiedError } from '../../src/utils/errors';

const BASE_URL = 'https://api.kite.trade';

function createClient(onSessionExpired?: (error: ClassifiedError) => void): KiteClient {
  return KiteClient.create(
    {
      apiKey: 'test-key',
      accessToken: 'test-token',
      retry: { maxRetries: 2, baseDelay: 1, maxDelay: 10 },
      timeout: 2000,
    },
    { logger: new Logger({ silent: true }), onSessionExpired }
  );
}

describe('KiteClient Integration', () => {
  let client: KiteClient | undefined;

  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterEach(async () => {
    await client?.close();
    client = undefined;
    nock.cleanAll();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  it('should fetch holdings with the token header', async () => {
    nock(BASE_URL)
      .get('/portfolio/holdings')
      .matchHeader('authorization', 'token test-key:test-token')
      .matchHeader('x-kite-version', '3')
      .reply(200, { status: 'success', data: [{ tradingsymbol: 'INFY', quantity: 5 }] });

    client = createClient();

    await expect(client.portfolio.holdings()).resolves.toEqual([{ tradingsymbol: 'INFY', quantity: 5 }]);
    expect(client.requestCount()).toBe(1);
  });

  it('should retry a read after a server error', async () => {
    const scope = nock(BASE_URL)
      .get('/portfolio/positions')
      .reply(503, 'Service Unavailable')
      .get('/portfolio/positions')
      .reply(200, { status: 'success', data: { net: [], day: [] } });

    client = createClient();

    await expect(client.portfolio.positions()).resolves.toEqual({ net: [], day: [] });
    expect(scope.isDone()).toBe(true);
    expect(client.requestCount()).toBe(2);

    const metrics = await client.getMetrics();
    expect(metrics).toContain('http_requests_total{category="standard",method="GET",status="503"} 1');
    expect(metrics).toContain('http_requests_total{category="standard",method="GET",status="200"} 1');
  });

  it('should send an order exactly once on a server error', async () => {
    const scope = nock(BASE_URL)
      .post('/orders/regular')
      .reply(500, { status: 'error', message: 'Order status unknown', error_type: 'GeneralException' });

    client = createClient();

    const error = await client.orders
      .placeOrder('regular', {
        exchange: 'NSE',
        tradingsymbol: 'INFY',
        transaction_type: 'BUY',
        quantity: 1,
        product: 'CNC',
        order_type: 'MARKET',
      })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GeneralException);
    expect(error).toMatchObject({ status: 500, message: 'Order status unknown' });
    expect(scope.isDone()).toBe(true);
    expect(client.requestCount()).toBe(1);
  });

  it('should report an expired session to the hook', async () => {
    nock(BASE_URL)
      .get('/user/profile')
      .reply(403, { status: 'error', message: 'Incorrect `api_key` or `access_token`.', error_type: 'TokenException' });

    const onSessionExpired = vi.fn<[ClassifiedError], void>();
    client = createClient(onSessionExpired);

    await expect(client.session.profile()).rejects.toBeInstanceOf(TokenException);
    expect(onSessionExpired).toHaveBeenCalledTimes(1);
    expect(client.requestCount()).toBe(1);
  });

  it('should space consecutive quote requests', async () => {
    nock(BASE_URL)
      .get('/quote/ltp')
      .query(true)
      .times(2)
      .reply(200, { status: 'success', data: {} });

    client = createClient();

    await client.market.ltp(['NSE:INFY']);
    const first = client.rateLimiterStats().categories.quote.lastRequestAt ?? 0;
    await client.market.ltp(['NSE:INFY']);
    const second = client.rateLimiterStats().categories.quote;

    // setTimeout may fire a millisecond early relative to Date.now
    expect((second.lastRequestAt ?? 0) - first).toBeGreaterThanOrEqual(990);
    expect(second.requestCount).toBe(2);
  });

  it('should expose rate limiter introspection', () => {
    client = createClient();

    expect(client.isRateLimitingEnabled()).toBe(true);
    expect(client.canRequestImmediately('quote')).toBe(true);
    expect(client.getDelayForRequest('historicalData')).toBe(0);
    expect(client.requestCount()).toBe(0);
  });

  it('should reject invalid configuration', () => {
    expect(() => KiteClient.create({ apiKey: '' })).toThrow();
  });
});
