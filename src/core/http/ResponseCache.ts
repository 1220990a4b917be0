// src/core/http/ResponseCache.ts

import type { CacheConfig } from './types';
import { systemClock, type Clock } from '../../utils/clock';

interface CacheEntry<V> {
  value: V;
  fetchedAt: number;
}

/**
 * TTL cache for slow-changing payloads such as the instrument master.
 *
 * Expiry is checked on read; stale entries stay in place until the next
 * `set` for their key supersedes them. Without a config the cache is a
 * permanent miss.
 */
export class ResponseCache<V> {
  private cache: Map<string, CacheEntry<V>> = new Map();
  readonly enabled: boolean;
  readonly ttl: number;
  readonly maxEntries: number;

  constructor(
    config: CacheConfig | undefined,
    private readonly clock: Clock = systemClock
  ) {
    this.enabled = config !== undefined;
    this.ttl = config?.ttl ?? 0;
    this.maxEntries = config?.maxEntries ?? 0;
  }

  get(key: string): V | undefined {
    if (!this.enabled) return undefined;

    const cached = this.cache.get(key);
    if (!cached) return undefined;

    if (this.clock.now() - cached.fetchedAt >= this.ttl) {
      return undefined;
    }

    return cached.value;
  }

  set(key: string, value: V): void {
    if (!this.enabled) return;

    // Evict oldest if at capacity
    if (!this.cache.has(key) && this.cache.size >= this.maxEntries) {
      const firstKey = this.cache.keys().next().value;
      if (firstKey !== undefined) {
        this.cache.delete(firstKey);
      }
    }

    this.cache.set(key, { value, fetchedAt: this.clock.now() });
  }

  get size(): number {
    return this.cache.size;
  }

  clear(): void {
    this.cache.clear();
  }
}
