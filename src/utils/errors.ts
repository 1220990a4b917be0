// src/utils/errors.ts

export class SDKError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error kinds reported by the remote API in the `error_type` field.
 */
export const REMOTE_ERROR_TYPES = [
  'TokenException',
  'UserException',
  'OrderException',
  'InputException',
  'MarginException',
  'HoldingException',
  'NetworkException',
  'DataException',
  'GeneralException',
] as const;

export type RemoteErrorType = (typeof REMOTE_ERROR_TYPES)[number];

export type ApiErrorKind = RemoteErrorType | 'Unknown';

export function isRemoteErrorType(value: string): value is RemoteErrorType {
  return REMOTE_ERROR_TYPES.some((type) => type === value);
}

export interface ApiErrorDetails extends Record<string, unknown> {
  status?: number;
  errorType?: string; // Raw `error_type` as sent by the remote
  operation?: string;
  cause?: unknown;
}

// API errors
export abstract class ApiError extends SDKError {
  abstract readonly kind: ApiErrorKind;
  readonly status?: number;
  readonly errorType?: string;

  constructor(message: string, code: string, details: ApiErrorDetails = {}) {
    super(message, code, details);
    this.status = details.status;
    this.errorType = details.errorType;
  }

  /** Session is invalid; the user must log in again. */
  get requiresReauth(): boolean {
    return this.kind === 'TokenException';
  }

  get isRateLimited(): boolean {
    return this.status === 429;
  }

  /** Likely to succeed if sent again unchanged. */
  get isRetryable(): boolean {
    if (this.kind === 'NetworkException' || this.kind === 'DataException') {
      return true;
    }
    if (this.status === undefined) return false;
    return this.status === 429 || (this.status >= 500 && this.status <= 599);
  }
}

export class TokenException extends ApiError {
  readonly kind = 'TokenException' as const;

  constructor(message: string = 'Session expired or invalid', details?: ApiErrorDetails) {
    super(message, 'TOKEN_EXCEPTION', details);
  }
}

export class UserException extends ApiError {
  readonly kind = 'UserException' as const;

  constructor(message: string, details?: ApiErrorDetails) {
    super(message, 'USER_EXCEPTION', details);
  }
}

export class OrderException extends ApiError {
  readonly kind = 'OrderException' as const;

  constructor(message: string, details?: ApiErrorDetails) {
    super(message, 'ORDER_EXCEPTION', details);
  }
}

export class InputException extends ApiError {
  readonly kind = 'InputException' as const;

  constructor(message: string, details?: ApiErrorDetails) {
    super(message, 'INPUT_EXCEPTION', details);
  }
}

export class MarginException extends ApiError {
  readonly kind = 'MarginException' as const;

  constructor(message: string, details?: ApiErrorDetails) {
    super(message, 'MARGIN_EXCEPTION', details);
  }
}

export class HoldingException extends ApiError {
  readonly kind = 'HoldingException' as const;

  constructor(message: string, details?: ApiErrorDetails) {
    super(message, 'HOLDING_EXCEPTION', details);
  }
}

export class NetworkException extends ApiError {
  readonly kind = 'NetworkException' as const;

  constructor(message: string = 'Network error', details?: ApiErrorDetails) {
    super(message, 'NETWORK_EXCEPTION', details);
  }
}

export class DataException extends ApiError {
  readonly kind = 'DataException' as const;

  constructor(message: string, details?: ApiErrorDetails) {
    super(message, 'DATA_EXCEPTION', details);
  }
}

export class GeneralException extends ApiError {
  readonly kind = 'GeneralException' as const;

  constructor(message: string, details?: ApiErrorDetails) {
    super(message, 'GENERAL_EXCEPTION', details);
  }
}

/**
 * An `error_type` this client does not know yet, kept verbatim.
 */
export class UnknownApiError extends ApiError {
  readonly kind = 'Unknown' as const;
  readonly rawErrorType: string;

  constructor(rawErrorType: string, message: string, details?: ApiErrorDetails) {
    super(message, 'UNKNOWN_API_ERROR', { ...details, errorType: rawErrorType });
    this.rawErrorType = rawErrorType;
  }
}

export type ClassifiedError =
  | TokenException
  | UserException
  | OrderException
  | InputException
  | MarginException
  | HoldingException
  | NetworkException
  | DataException
  | GeneralException
  | UnknownApiError;

export function isClassifiedError(value: unknown): value is ClassifiedError {
  return value instanceof ApiError;
}
