// src/core/endpoints/EndpointRegistry.ts

import type { Endpoint, EndpointConfig, RateLimitCategory } from './types';

/**
 * Requests per second allowed by the remote service for each category.
 */
export const CATEGORY_LIMITS: Readonly<Record<RateLimitCategory, number>> = {
  quote: 1,
  historical: 3,
  orders: 10,
  standard: 10,
};

export const RATE_LIMIT_CATEGORIES: readonly RateLimitCategory[] = [
  'quote',
  'historical',
  'orders',
  'standard',
];

export function requestsPerSecond(category: RateLimitCategory): number {
  return CATEGORY_LIMITS[category];
}

/**
 * Minimum gap between two requests of one category, in whole milliseconds.
 */
export function minDelayMs(category: RateLimitCategory): number {
  return Math.floor(1000 / CATEGORY_LIMITS[category]);
}

export const ENDPOINTS = {
  // Session
  loginUrl: { method: 'GET', path: '/connect/login', category: 'standard', requiresAuth: false },
  generateSession: { method: 'POST', path: '/session/token', category: 'standard', requiresAuth: false },
  invalidateSession: { method: 'DELETE', path: '/session/token', category: 'standard', requiresAuth: true },
  renewAccessToken: { method: 'POST', path: '/session/refresh_token', category: 'standard', requiresAuth: false },
  invalidateRefreshToken: { method: 'DELETE', path: '/session/refresh_token', category: 'standard', requiresAuth: true },

  // User
  profile: { method: 'GET', path: '/user/profile', category: 'standard', requiresAuth: true },
  margins: { method: 'GET', path: '/user/margins', category: 'standard', requiresAuth: true },
  marginsSegment: { method: 'GET', path: '/user/margins', category: 'standard', requiresAuth: true },

  // Portfolio
  holdings: { method: 'GET', path: '/portfolio/holdings', category: 'standard', requiresAuth: true },
  positions: { method: 'GET', path: '/portfolio/positions', category: 'standard', requiresAuth: true },
  convertPosition: { method: 'PUT', path: '/portfolio/positions', category: 'standard', requiresAuth: true },

  // Orders
  placeOrder: { method: 'POST', path: '/orders', category: 'orders', requiresAuth: true },
  modifyOrder: { method: 'PUT', path: '/orders', category: 'orders', requiresAuth: true },
  cancelOrder: { method: 'DELETE', path: '/orders', category: 'orders', requiresAuth: true },
  orders: { method: 'GET', path: '/orders', category: 'standard', requiresAuth: true },
  orderHistory: { method: 'GET', path: '/orders', category: 'standard', requiresAuth: true },
  trades: { method: 'GET', path: '/trades', category: 'standard', requiresAuth: true },
  orderTrades: { method: 'GET', path: '/orders', category: 'standard', requiresAuth: true },

  // Market data
  quote: { method: 'GET', path: '/quote', category: 'quote', requiresAuth: true },
  ohlc: { method: 'GET', path: '/quote/ohlc', category: 'quote', requiresAuth: true },
  ltp: { method: 'GET', path: '/quote/ltp', category: 'quote', requiresAuth: true },
  historicalData: { method: 'GET', path: '/instruments/historical', category: 'historical', requiresAuth: true },
  instruments: { method: 'GET', path: '/instruments', category: 'standard', requiresAuth: true, cacheable: true },
  mfInstruments: { method: 'GET', path: '/mf/instruments', category: 'standard', requiresAuth: true, cacheable: true },
  triggerRange: { method: 'GET', path: '/instruments/trigger_range', category: 'standard', requiresAuth: true },
  marketMargins: { method: 'GET', path: '/margins', category: 'standard', requiresAuth: true },

  // Mutual funds
  placeMfOrder: { method: 'POST', path: '/mf/orders', category: 'orders', requiresAuth: true },
  cancelMfOrder: { method: 'DELETE', path: '/mf/orders', category: 'orders', requiresAuth: true },
  mfOrders: { method: 'GET', path: '/mf/orders', category: 'standard', requiresAuth: true },
  mfOrderInfo: { method: 'GET', path: '/mf/orders', category: 'standard', requiresAuth: true },
  mfHoldings: { method: 'GET', path: '/mf/holdings', category: 'standard', requiresAuth: true },
  placeSip: { method: 'POST', path: '/mf/sips', category: 'orders', requiresAuth: true },
  modifySip: { method: 'PUT', path: '/mf/sips', category: 'orders', requiresAuth: true },
  cancelSip: { method: 'DELETE', path: '/mf/sips', category: 'orders', requiresAuth: true },
  sips: { method: 'GET', path: '/mf/sips', category: 'standard', requiresAuth: true },
  sipInfo: { method: 'GET', path: '/mf/sips', category: 'standard', requiresAuth: true },

  // GTT triggers
  placeGtt: { method: 'POST', path: '/gtt/triggers', category: 'orders', requiresAuth: true },
  modifyGtt: { method: 'PUT', path: '/gtt/triggers', category: 'orders', requiresAuth: true },
  cancelGtt: { method: 'DELETE', path: '/gtt/triggers', category: 'orders', requiresAuth: true },
  gtts: { method: 'GET', path: '/gtt/triggers', category: 'standard', requiresAuth: true },
  gttInfo: { method: 'GET', path: '/gtt/triggers', category: 'standard', requiresAuth: true },
} as const satisfies Record<string, EndpointConfig>;

export type Operation = keyof typeof ENDPOINTS;

function compile(): ReadonlyMap<Operation, Endpoint<Operation>> {
  const table = new Map<Operation, Endpoint<Operation>>();
  for (const [operation, config] of Object.entries<EndpointConfig>(ENDPOINTS)) {
    if (!isOperation(operation)) continue;
    table.set(
      operation,
      Object.freeze({
        operation,
        method: config.method,
        path: config.path,
        category: config.category,
        requiresAuth: config.requiresAuth,
        cacheable: config.cacheable ?? false,
      })
    );
  }
  return table;
}

export function isOperation(value: string): value is Operation {
  return Object.prototype.hasOwnProperty.call(ENDPOINTS, value);
}

const REGISTRY = compile();

export const OPERATIONS: readonly Operation[] = Array.from(REGISTRY.keys());

/**
 * Look up the static description of an operation.
 *
 * Total over {@link Operation}: every declared operation has an entry.
 */
export function resolveEndpoint(operation: Operation): Endpoint<Operation> {
  const endpoint = REGISTRY.get(operation);
  if (!endpoint) {
    // Only reachable from untyped callers
    throw new TypeError(`Unknown operation: ${String(operation)}`);
  }
  return endpoint;
}

/**
 * Append path segments to an endpoint's template path.
 *
 * @example
 * buildPath(resolveEndpoint('orderTrades'), ['151220000000000', 'trades'])
 * // => '/orders/151220000000000/trades'
 */
export function buildPath(endpoint: Endpoint, segments: readonly string[] = []): string {
  if (segments.length === 0) {
    return endpoint.path;
  }
  return `${endpoint.path}/${segments.join('/')}`;
}

export function endpointsByCategory(category: RateLimitCategory): Endpoint<Operation>[] {
  return Array.from(REGISTRY.values()).filter((endpoint) => endpoint.category === category);
}

/**
 * Read-shaped operations can be replayed without side effects.
 */
export function isIdempotent(endpoint: Endpoint): boolean {
  return endpoint.method === 'GET';
}
