// src/core/http/types.ts

import type { HttpMethod, RateLimitCategory } from '../endpoints/types';

export type QueryValue = string | number | boolean | readonly string[];

export type QueryParams = Record<string, QueryValue | undefined>;

export type FormBody = Record<string, string | number | boolean | undefined>;

export interface DispatchOptions {
  segments?: readonly string[];
  query?: QueryParams;
  body?: FormBody;
}

export interface HttpResponse<T = unknown> {
  data: T;
  status: number;
  headers: Record<string, string>;
  cached?: boolean; // True if served from the response cache
}

export interface RetryConfig {
  maxRetries: number;
  baseDelay: number; // milliseconds
  maxDelay: number;
  exponentialBackoff: boolean;
}

export interface CacheConfig {
  ttl: number; // milliseconds
  maxEntries: number;
}

export interface CategoryStats {
  requestCount: number; // Informational; never reset
  requestsPerSecond: number;
  minDelayMs: number;
  lastRequestAt?: number;
  nextAvailableAt?: number;
  isAtLimit: boolean;
  remainingCapacity: number;
}

export interface RateLimiterStats {
  enabled: boolean;
  categories: Record<RateLimitCategory, CategoryStats>;
}

export type { HttpMethod };
