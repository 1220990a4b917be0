// tests/unit/EndpointRegistry.test.ts

import { describe, it, expect } from 'vitest';
import {
  ENDPOINTS,
  OPERATIONS,
  buildPath,
  endpointsByCategory,
  isIdempotent,
  isOperation,
  minDelayMs,
  requestsPerSecond,
  resolveEndpoint,
} from '../../src/core/endpoints/EndpointRegistry';

describe('EndpointRegistry', () => {
  it('should resolve every declared operation', () => {
    expect(OPERATIONS).toHaveLength(Object.keys(ENDPOINTS).length);

    for (const operation of OPERATIONS) {
      const endpoint = resolveEndpoint(operation);
      expect(endpoint.operation).toBe(operation);
      expect(endpoint.path.startsWith('/')).toBe(true);
    }
  });

  it('should describe quote as an authenticated GET in the quote category', () => {
    expect(resolveEndpoint('quote')).toEqual({
      operation: 'quote',
      method: 'GET',
      path: '/quote',
      category: 'quote',
      requiresAuth: true,
      cacheable: false,
    });
  });

  it('should return frozen endpoint descriptions', () => {
    expect(Object.isFrozen(resolveEndpoint('holdings'))).toBe(true);
  });

  it('should allow session exchange without an access token', () => {
    expect(resolveEndpoint('generateSession').requiresAuth).toBe(false);
    expect(resolveEndpoint('renewAccessToken').requiresAuth).toBe(false);
    expect(resolveEndpoint('invalidateSession').requiresAuth).toBe(true);
  });

  it('should put order writes in the orders category', () => {
    for (const operation of ['placeOrder', 'modifyOrder', 'cancelOrder', 'placeGtt', 'placeSip'] as const) {
      expect(resolveEndpoint(operation).category).toBe('orders');
    }
    expect(resolveEndpoint('orders').category).toBe('standard');
  });

  it('should mark only instrument masters as cacheable', () => {
    const cacheable = OPERATIONS.filter((operation) => resolveEndpoint(operation).cacheable);
    expect(cacheable).toEqual(['instruments', 'mfInstruments']);
  });

  it('should group endpoints by category', () => {
    expect(endpointsByCategory('quote').map((endpoint) => endpoint.operation)).toEqual([
      'quote',
      'ohlc',
      'ltp',
    ]);
    expect(endpointsByCategory('historical').map((endpoint) => endpoint.operation)).toEqual([
      'historicalData',
    ]);
  });

  describe('category limits', () => {
    it('should derive the minimum gap from requests per second', () => {
      expect(requestsPerSecond('quote')).toBe(1);
      expect(minDelayMs('quote')).toBe(1000);
      expect(requestsPerSecond('historical')).toBe(3);
      expect(minDelayMs('historical')).toBe(333);
      expect(minDelayMs('orders')).toBe(100);
      expect(minDelayMs('standard')).toBe(100);
    });
  });

  describe('buildPath', () => {
    it('should return the template path without segments', () => {
      expect(buildPath(resolveEndpoint('orders'))).toBe('/orders');
    });

    it('should append segments in order', () => {
      expect(buildPath(resolveEndpoint('orderTrades'), ['151220000000000', 'trades'])).toBe(
        '/orders/151220000000000/trades'
      );
      expect(buildPath(resolveEndpoint('historicalData'), ['5633', 'day'])).toBe(
        '/instruments/historical/5633/day'
      );
    });
  });

  it('should treat only GET endpoints as idempotent', () => {
    expect(isIdempotent(resolveEndpoint('holdings'))).toBe(true);
    expect(isIdempotent(resolveEndpoint('placeOrder'))).toBe(false);
    expect(isIdempotent(resolveEndpoint('cancelOrder'))).toBe(false);
  });

  it('should recognise operation names', () => {
    expect(isOperation('ltp')).toBe(true);
    expect(isOperation('toString')).toBe(false);
    expect(isOperation('bogus')).toBe(false);
  });
});
