// src/core/endpoints/types.ts

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type RateLimitCategory = 'quote' | 'historical' | 'orders' | 'standard';

export interface EndpointConfig {
  method: HttpMethod;
  path: string;
  category: RateLimitCategory;
  requiresAuth: boolean;
  cacheable?: boolean; // Slow-changing payloads (instrument masters)
}

export interface Endpoint<Op extends string = string> {
  readonly operation: Op;
  readonly method: HttpMethod;
  readonly path: string;
  readonly category: RateLimitCategory;
  readonly requiresAuth: boolean;
  readonly cacheable: boolean;
}
