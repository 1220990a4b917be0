// src/core/errors/ErrorClassifier.ts

import { z } from 'zod';
import {
  type ApiErrorDetails,
  type ClassifiedError,
  DataException,
  GeneralException,
  HoldingException,
  InputException,
  MarginException,
  NetworkException,
  OrderException,
  type RemoteErrorType,
  TokenException,
  UnknownApiError,
  UserException,
  isClassifiedError,
  isRemoteErrorType,
} from '../../utils/errors';

/**
 * Error envelope returned by the API:
 * `{ "status": "error", "message": "...", "error_type": "...", "data": null }`
 */
export const ErrorEnvelopeSchema = z.object({
  // A field of the wrong type is dropped on its own; the rest still count
  status: z.string().nullish().catch(undefined),
  message: z.string().nullish().catch(undefined),
  error_type: z.string().nullish().catch(undefined),
  data: z.unknown().optional(),
});

export type ErrorEnvelope = z.infer<typeof ErrorEnvelopeSchema>;

const REMOTE_ERRORS: Record<
  RemoteErrorType,
  new (message: string, details?: ApiErrorDetails) => ClassifiedError
> = {
  TokenException,
  UserException,
  OrderException,
  InputException,
  MarginException,
  HoldingException,
  NetworkException,
  DataException,
  GeneralException,
};

export function parseErrorEnvelope(body: string): ErrorEnvelope | undefined {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return undefined;
  }
  const result = ErrorEnvelopeSchema.safeParse(json);
  return result.success ? result.data : undefined;
}

/**
 * Map an HTTP outcome to the closed error taxonomy.
 *
 * An `error_type` in a parseable envelope wins; status-code heuristics apply
 * otherwise. Pure: equal inputs give equal results.
 */
export function classify(status: number, body: string): ClassifiedError {
  const envelope = parseErrorEnvelope(body);
  const message = envelope?.message || body.trim() || `HTTP ${status}`;
  const details: ApiErrorDetails = { status };

  const errorType = envelope?.error_type;
  if (errorType) {
    if (isRemoteErrorType(errorType)) {
      const ErrorClass = REMOTE_ERRORS[errorType];
      return new ErrorClass(message, { ...details, errorType });
    }
    return new UnknownApiError(errorType, message, details);
  }

  return classifyStatus(status, message, details);
}

function classifyStatus(status: number, message: string, details: ApiErrorDetails): ClassifiedError {
  if (status === 400) return new InputException(message, details);
  if (status === 403) return new TokenException(message, details);
  if (status === 429) return new NetworkException(message, details);
  if (status >= 400 && status <= 499) return new GeneralException(message, details);
  if (status >= 500 && status <= 599) return new DataException(message, details);
  return new GeneralException(message, details);
}

/**
 * Failures below HTTP (timeouts, resets, DNS) carry no status and are transient.
 */
export function classifyTransportError(error: unknown): ClassifiedError {
  if (isClassifiedError(error)) {
    return error;
  }

  const code = errorCode(error);
  const reason = error instanceof Error ? error.message : String(error);
  const message =
    code === 'ECONNABORTED' || code === 'ETIMEDOUT'
      ? `Request timeout: ${reason}`
      : `Network error: ${reason}`;

  return new NetworkException(message, { cause: error, transportCode: code });
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
