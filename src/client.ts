// src/client.ts

import type { ApiDeps } from './api/types';
import type { DispatchOptions, HttpResponse, RateLimiterStats } from './core/http/types';
import type { Transport } from './core/http/Transport';
import type { Hasher } from './core/auth/Hasher';
import type { ClassifiedError } from './utils/errors';
import type { Clock } from './utils/clock';
import { AxiosTransport } from './core/http/Transport';
import { NodeHasher } from './core/auth/Hasher';
import { Credentials } from './core/auth/Credentials';
import { HttpCore } from './core/http/HttpCore';
import { resolveEndpoint, type Operation } from './core/endpoints/EndpointRegistry';
import { Logger } from './observability/Logger';
import { MetricsCollector } from './observability/MetricsCollector';
import { systemClock } from './utils/clock';
import { validateConfig, type ClientConfig, type ResolvedClientConfig } from './config/ConfigValidator';
import { SessionApi } from './api/SessionApi';
import { PortfolioApi } from './api/PortfolioApi';
import { OrdersApi } from './api/OrdersApi';
import { MarketApi } from './api/MarketApi';
import { MutualFundsApi } from './api/MutualFundsApi';
import { GttApi } from './api/GttApi';

/**
 * Collaborators that replace the defaults, mostly for tests
 */
export interface ClientOverrides {
  transport?: Transport;
  hasher?: Hasher;
  clock?: Clock;
  logger?: Logger;
  onSessionExpired?: (error: ClassifiedError) => void;
}

export class KiteClient {
  readonly session: SessionApi;
  readonly portfolio: PortfolioApi;
  readonly orders: OrdersApi;
  readonly market: MarketApi;
  readonly mutualFunds: MutualFundsApi;
  readonly gtt: GttApi;

  private core: ApiDeps;
  private metrics: MetricsCollector;

  /**
   * Dependencies are built before anything reads `this.core`
   */
  private constructor(config: ResolvedClientConfig, overrides: ClientOverrides) {
    const logger = overrides.logger ?? new Logger(config.logging);
    const metrics = new MetricsCollector(config.metrics, logger);
    const credentials = new Credentials(config.apiKey, config.accessToken);
    const transport =
      overrides.transport ?? new AxiosTransport({ timeout: config.timeout, keepAlive: config.keepAlive });
    const http = new HttpCore({
      baseUrl: config.baseUrl,
      retry: config.retry,
      enableRateLimiting: config.enableRateLimiting,
      cache: config.cache,
      transport,
      credentials,
      clock: overrides.clock ?? systemClock,
      metrics,
      logger,
      onSessionExpired: overrides.onSessionExpired,
    });
    const hasher = overrides.hasher ?? new NodeHasher();

    this.core = { http, credentials, hasher, logger, loginBaseUrl: config.loginBaseUrl };
    this.metrics = metrics;

    this.session = new SessionApi(this.core);
    this.portfolio = new PortfolioApi(this.core);
    this.orders = new OrdersApi(this.core);
    this.market = new MarketApi(this.core);
    this.mutualFunds = new MutualFundsApi(this.core);
    this.gtt = new GttApi(this.core);
  }

  /**
   * Create a client
   *
   * @throws {z.ZodError} If the configuration is invalid
   *
   * @example
   * ```typescript
   * const client = KiteClient.create({
   *   apiKey: process.env.KITE_API_KEY,
   *   retry: { maxRetries: 3, baseDelay: 200, maxDelay: 5000 },
   *   cache: { ttl: 60 * 60 * 1000 },
   * });
   * await client.session.generateSession(requestToken, process.env.KITE_API_SECRET);
   * const holdings = await client.portfolio.holdings();
   * ```
   */
  static create(config: ClientConfig, overrides: ClientOverrides = {}): KiteClient {
    const validated = validateConfig(config);
    const client = new KiteClient(validated, overrides);

    client.core.logger.info('Client initialized', {
      baseUrl: validated.baseUrl,
      rateLimiting: validated.enableRateLimiting,
      cache: validated.cache !== undefined,
      maxRetries: validated.retry.maxRetries,
    });

    return client;
  }

  /**
   * Send any registered operation through the shared pipeline
   */
  async dispatch(operation: Operation, options?: DispatchOptions): Promise<HttpResponse> {
    return this.core.http.dispatch(operation, options);
  }

  isRateLimitingEnabled(): boolean {
    return this.core.http.context.rateLimiter.isEnabled();
  }

  canRequestImmediately(operation: Operation): boolean {
    return this.core.http.context.rateLimiter.canRequestImmediately(resolveEndpoint(operation));
  }

  /**
   * Milliseconds the next request of this operation's category would wait
   */
  getDelayForRequest(operation: Operation): number {
    return this.core.http.context.rateLimiter.delayUntilNextRequest(resolveEndpoint(operation));
  }

  rateLimiterStats(): RateLimiterStats {
    return this.core.http.context.rateLimiter.getStats();
  }

  /**
   * Wire attempts made by this client, retries included
   */
  requestCount(): number {
    return this.core.http.context.counter.value;
  }

  get accessToken(): string | undefined {
    return this.core.credentials.accessToken;
  }

  setAccessToken(accessToken: string | undefined): void {
    this.core.credentials.setAccessToken(accessToken);
  }

  loginUrl(): string {
    return this.session.loginUrl();
  }

  async getMetrics(): Promise<string> {
    return this.metrics.getMetrics();
  }

  async close(): Promise<void> {
    this.core.http.context.cache.clear();
    await this.metrics.close();
    this.core.logger.info('Client closed');
  }
}
