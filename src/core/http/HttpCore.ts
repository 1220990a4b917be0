// src/core/http/HttpCore.ts

import { z } from 'zod';
import type { CacheConfig, DispatchOptions, FormBody, HttpResponse, QueryParams, RetryConfig } from './types';
import type { Transport, TransportRequest, TransportResponse } from './Transport';
import type { Credentials } from '../auth/Credentials';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { Logger } from '../../observability/Logger';
import type { Endpoint } from '../endpoints/types';
import { buildPath, resolveEndpoint, type Operation } from '../endpoints/EndpointRegistry';
import { classify, classifyTransportError } from '../errors/ErrorClassifier';
import { PipelineContext } from './PipelineContext';
import { RetryHandler } from './RetryHandler';
import { generateCorrelationId, withHttpSpan } from '../../observability/tracing';
import type { ClassifiedError } from '../../utils/errors';
import type { Clock } from '../../utils/clock';

export const USER_AGENT = 'kite-rest-client/1.0';

const SuccessEnvelopeSchema = z.object({
  status: z.literal('success'),
  data: z.unknown(),
});

const ErrorStatusSchema = z.object({ status: z.literal('error') });

export interface HttpCoreOptions {
  baseUrl: string;
  retry: RetryConfig;
  enableRateLimiting: boolean;
  cache?: CacheConfig;
  transport: Transport;
  credentials: Credentials;
  clock: Clock;
  metrics: MetricsCollector;
  logger: Logger;
  onSessionExpired?: (error: ClassifiedError) => void;
}

/**
 * The single request pipeline every API method goes through:
 * registry → cache → (rate limiter → transport) under retry → cache.
 */
export class HttpCore {
  readonly context: PipelineContext;
  private retryHandler: RetryHandler;
  private transport: Transport;
  private credentials: Credentials;
  private metrics: MetricsCollector;
  private logger: Logger;

  constructor(private options: HttpCoreOptions) {
    this.transport = options.transport;
    this.credentials = options.credentials;
    this.metrics = options.metrics;
    this.logger = options.logger;

    this.context = new PipelineContext({
      enableRateLimiting: options.enableRateLimiting,
      cache: options.cache,
      clock: options.clock,
      logger: options.logger,
      metrics: options.metrics,
    });

    this.retryHandler = new RetryHandler(
      options.retry,
      options.logger,
      this.context.counter,
      options.clock,
      options.metrics
    );
  }

  /**
   * Resolve, gate, send and decode one API operation.
   *
   * @throws {ApiError} One classified error once retries are exhausted or
   *   the failure is not retryable
   */
  async dispatch(operation: Operation, options: DispatchOptions = {}): Promise<HttpResponse> {
    const endpoint = resolveEndpoint(operation);
    const url = this.buildUrl(buildPath(endpoint, options.segments), options.query);
    const cacheKey = endpoint.cacheable ? `${endpoint.method} ${url}` : undefined;

    if (cacheKey) {
      const cached = this.context.cache.get(cacheKey);
      if (cached) {
        this.logger.debug('Serving cached response', { operation, url });
        this.metrics.incrementCounter('http_cache_hits', { operation });
        return { ...cached, cached: true };
      }
    }

    const startTime = Date.now();

    try {
      const request = this.buildRequest(endpoint, url, options.body);

      this.logger.debug('HTTP request', {
        requestId: request.headers['X-Request-ID'],
        operation,
        method: endpoint.method,
        url,
        headerKeys: Object.keys(request.headers),
      });

      const result = await withHttpSpan(endpoint.method, url, operation, async () => {
        const response = await this.retryHandler.execute(endpoint, () =>
          this.sendOnce(endpoint, request)
        );
        return this.toHttpResponse(response);
      });

      this.metrics.recordLatency('http_request_duration', Date.now() - startTime, {
        category: endpoint.category,
        status: result.status,
      });

      if (cacheKey) {
        this.context.cache.set(cacheKey, result);
      }

      return result;
    } catch (thrown: unknown) {
      const error = classifyTransportError(thrown);

      this.metrics.incrementCounter('http_errors', {
        category: endpoint.category,
        kind: error.kind,
      });
      this.logger.error('Request failed', {
        operation,
        status: error.status,
        kind: error.kind,
        error: error.message,
      });

      if (error.requiresReauth) {
        this.notifySessionExpired(error);
      }

      throw error;
    }
  }

  /**
   * One wire attempt: wait for the category gate, then send.
   */
  private async sendOnce(endpoint: Endpoint, request: TransportRequest): Promise<TransportResponse> {
    await this.context.rateLimiter.waitForRequest(endpoint);

    try {
      const response = await this.transport.perform(request);
      this.metrics.incrementCounter('http_requests_total', {
        category: endpoint.category,
        method: endpoint.method,
        status: response.status,
      });
      return response;
    } catch (error: unknown) {
      this.metrics.incrementCounter('http_requests_total', {
        category: endpoint.category,
        method: endpoint.method,
        status: 'error',
      });
      throw error;
    }
  }

  private buildRequest(endpoint: Endpoint, url: string, body?: FormBody): TransportRequest {
    const headers: Record<string, string> = {
      'X-Request-ID': generateCorrelationId(),
      'User-Agent': USER_AGENT,
      ...this.credentials.headersFor(endpoint.requiresAuth),
    };

    const encoded = encodeForm(body);
    if (encoded !== undefined) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
    }

    return { method: endpoint.method, url, headers, body: encoded };
  }

  buildUrl(path: string, query?: QueryParams): string {
    const url = new URL(path.replace(/^\//, ''), withTrailingSlash(this.options.baseUrl));

    for (const [key, value] of Object.entries(query ?? {})) {
      if (value === undefined) continue;
      if (typeof value === 'object') {
        for (const item of value) url.searchParams.append(key, item);
      } else {
        url.searchParams.append(key, String(value));
      }
    }

    return url.toString();
  }

  /**
   * Unwrap `{ status: "success", data }`. CSV dumps pass through as text.
   */
  private toHttpResponse(response: TransportResponse): HttpResponse {
    const parsed = parseJson(response.body);

    if (parsed.ok) {
      if (ErrorStatusSchema.safeParse(parsed.value).success) {
        throw classify(response.status, response.body);
      }
      const envelope = SuccessEnvelopeSchema.safeParse(parsed.value);
      return {
        data: envelope.success ? envelope.data.data : parsed.value,
        status: response.status,
        headers: response.headers,
      };
    }

    return { data: response.body, status: response.status, headers: response.headers };
  }

  private notifySessionExpired(error: ClassifiedError): void {
    const hook = this.options.onSessionExpired;
    if (!hook) return;

    try {
      hook(error);
    } catch (hookError: unknown) {
      this.logger.error('Session expiry hook failed', {
        error: hookError instanceof Error ? hookError.message : String(hookError),
      });
    }
  }
}

function withTrailingSlash(baseUrl: string): string {
  return baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
}

export function encodeForm(body?: FormBody): string | undefined {
  if (!body) return undefined;

  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(body)) {
    if (value !== undefined) params.append(key, String(value));
  }
  return params.toString();
}

function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}
