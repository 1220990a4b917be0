// src/config/ConfigValidator.ts

import { z } from 'zod';

export const DEFAULT_BASE_URL = 'https://api.kite.trade';
export const DEFAULT_LOGIN_BASE_URL = 'https://kite.trade';

// Retry Configuration Schema
const RetryConfigSchema = z
  .object({
    maxRetries: z.number().int().min(0).max(10).default(3),
    baseDelay: z.number().positive().default(200),
    maxDelay: z.number().positive().default(5000),
    exponentialBackoff: z.boolean().default(true),
  })
  .refine((data) => data.maxDelay >= data.baseDelay, {
    message: 'maxDelay must be greater than or equal to baseDelay',
  });

// Response Cache Configuration Schema (omit to disable caching)
const CacheConfigSchema = z.object({
  ttl: z.number().positive().default(60 * 60 * 1000),
  maxEntries: z.number().int().positive().default(1000),
});

// Logger Configuration Schema
const LoggerConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    format: z.enum(['json', 'pretty']).optional(),
    silent: z.boolean().optional(),
  })
  .optional();

// Metrics Configuration Schema
const MetricsConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
    port: z.number().int().min(1024).max(65535).optional(),
    path: z.string().startsWith('/').optional(),
  })
  .optional();

// Complete Client Configuration Schema
export const ClientConfigSchema = z.object({
  apiKey: z.string().min(1, 'apiKey is required'),
  accessToken: z.string().min(1).optional(),
  baseUrl: z.string().url().default(DEFAULT_BASE_URL),
  loginBaseUrl: z.string().url().default(DEFAULT_LOGIN_BASE_URL),
  timeout: z.number().int().positive().default(30000),
  keepAlive: z.boolean().default(true),
  enableRateLimiting: z.boolean().default(true),
  retry: RetryConfigSchema.default({}),
  cache: CacheConfigSchema.optional(),
  logging: LoggerConfigSchema,
  metrics: MetricsConfigSchema,
});

export type ClientConfig = z.input<typeof ClientConfigSchema>;
export type ResolvedClientConfig = z.output<typeof ClientConfigSchema>;

/**
 * Validate client configuration and apply defaults
 *
 * @throws {z.ZodError} If configuration is invalid with detailed error messages
 */
export function validateConfig(config: unknown): ResolvedClientConfig {
  return ClientConfigSchema.parse(config);
}

/**
 * Validate configuration and return user-friendly errors
 */
export function validateConfigSafe(
  config: unknown
): { success: true; data: ResolvedClientConfig } | { success: false; errors: string[] } {
  const result = ClientConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
  };
}
