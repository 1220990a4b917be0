// src/index.ts

export { KiteClient } from './client';
export type { ClientOverrides } from './client';
export {
  ClientConfigSchema,
  validateConfig,
  validateConfigSafe,
  DEFAULT_BASE_URL,
  DEFAULT_LOGIN_BASE_URL,
} from './config/ConfigValidator';
export type { ClientConfig, ResolvedClientConfig } from './config/ConfigValidator';

// Endpoint registry
export {
  ENDPOINTS,
  OPERATIONS,
  CATEGORY_LIMITS,
  RATE_LIMIT_CATEGORIES,
  resolveEndpoint,
  buildPath,
  endpointsByCategory,
  isIdempotent,
  isOperation,
  minDelayMs,
  requestsPerSecond,
} from './core/endpoints/EndpointRegistry';
export type { Operation } from './core/endpoints/EndpointRegistry';
export type { Endpoint, EndpointConfig, HttpMethod, RateLimitCategory } from './core/endpoints/types';

// Pipeline
export { HttpCore } from './core/http/HttpCore';
export { RateLimiter } from './core/http/RateLimiter';
export { RetryHandler } from './core/http/RetryHandler';
export { ResponseCache } from './core/http/ResponseCache';
export { PipelineContext, RequestCounter } from './core/http/PipelineContext';
export { AxiosTransport } from './core/http/Transport';
export type { Transport, TransportRequest, TransportResponse } from './core/http/Transport';
export type {
  CacheConfig,
  CategoryStats,
  DispatchOptions,
  FormBody,
  HttpResponse,
  QueryParams,
  RateLimiterStats,
  RetryConfig,
} from './core/http/types';
export { classify, classifyTransportError } from './core/errors/ErrorClassifier';

// Auth
export { Credentials } from './core/auth/Credentials';
export { NodeHasher, WebCryptoHasher } from './core/auth/Hasher';
export type { Hasher } from './core/auth/Hasher';
export type { Clock } from './utils/clock';

// API namespaces
export type { Session, TokenRenewal } from './api/schemas';
export type {
  Exchange,
  TransactionType,
  Product,
  OrderType,
  OrderVariety,
  Validity,
  OrderParams,
  ModifyOrderParams,
  ConvertPositionParams,
  MfOrderParams,
  SipParams,
  ModifySipParams,
  HistoricalInterval,
  HistoricalOptions,
  GttOrder,
  GttParams,
} from './api/types';

// Observability
export { Logger } from './observability/Logger';
export type { LoggerConfig } from './observability/Logger';
export { MetricsCollector } from './observability/MetricsCollector';
export type { MetricsConfig } from './observability/MetricsCollector';

// Export error classes for error handling
export {
  SDKError,
  ApiError,
  TokenException,
  UserException,
  OrderException,
  InputException,
  MarginException,
  HoldingException,
  NetworkException,
  DataException,
  GeneralException,
  UnknownApiError,
  isClassifiedError,
  REMOTE_ERROR_TYPES,
} from './utils/errors';
export type { ApiErrorKind, ClassifiedError, RemoteErrorType } from './utils/errors';
