// tests/unit/ConfigValidator.test.ts

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_BASE_URL,
  DEFAULT_LOGIN_BASE_URL,
  validateConfig,
  validateConfigSafe,
} from '../../src/config/ConfigValidator';

describe('ConfigValidator', () => {
  it('should apply defaults', () => {
    const config = validateConfig({ apiKey: 'test-key' });

    expect(config).toEqual({
      apiKey: 'test-key',
      baseUrl: DEFAULT_BASE_URL,
      loginBaseUrl: DEFAULT_LOGIN_BASE_URL,
      timeout: 30000,
      keepAlive: true,
      enableRateLimiting: true,
      retry: { maxRetries: 3, baseDelay: 200, maxDelay: 5000, exponentialBackoff: true },
    });
  });

  it('should fill cache defaults when caching is requested', () => {
    expect(validateConfig({ apiKey: 'test-key', cache: {} }).cache).toEqual({
      ttl: 3_600_000,
      maxEntries: 1000,
    });
  });

  it('should merge partial retry settings with defaults', () => {
    expect(validateConfig({ apiKey: 'test-key', retry: { maxRetries: 0 } }).retry).toEqual({
      maxRetries: 0,
      baseDelay: 200,
      maxDelay: 5000,
      exponentialBackoff: true,
    });
  });

  it('should require an API key', () => {
    expect(() => validateConfig({})).toThrow();
    expect(validateConfigSafe({ apiKey: '' })).toEqual({
      success: false,
      errors: ['apiKey: apiKey is required'],
    });
  });

  it('should reject maxDelay below baseDelay', () => {
    const result = validateConfigSafe({ apiKey: 'test-key', retry: { baseDelay: 1000, maxDelay: 500 } });

    expect(result).toEqual({
      success: false,
      errors: ['retry: maxDelay must be greater than or equal to baseDelay'],
    });
  });

  it('should reject out-of-range retry counts', () => {
    expect(validateConfigSafe({ apiKey: 'test-key', retry: { maxRetries: 11 } }).success).toBe(false);
    expect(validateConfigSafe({ apiKey: 'test-key', retry: { maxRetries: -1 } }).success).toBe(false);
  });

  it('should reject invalid URLs', () => {
    expect(validateConfigSafe({ apiKey: 'test-key', baseUrl: 'not-a-url' }).success).toBe(false);
  });

  it('should reject metrics paths without a leading slash', () => {
    expect(validateConfigSafe({ apiKey: 'test-key', metrics: { path: 'metrics' } }).success).toBe(false);
  });
});
