/**
 * Typed error model.
 *
 * Services throw a ServiceError carrying a TypedError; the API layer turns
 * the error code into an HTTP status and returns the TypedError as the body.
 */

/** The core typed error structure returned in API responses. */
export interface TypedError {
  /** Namespaced error code (e.g., "VALIDATION.CONFLICT"). */
  code: string;
  /** Human-readable, non-sensitive message. */
  message: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    retryable: params.retryable ?? false,
    details: params.details,
  };
}

/** Error thrown by services; `typedError` is what the caller sees. */
export class ServiceError extends Error {
  constructor(public readonly typedError: TypedError) {
    super(typedError.message);
    this.name = 'ServiceError';
  }

  get code(): string {
    return this.typedError.code;
  }
}

export function isServiceError(err: unknown): err is ServiceError {
  return err instanceof ServiceError;
}

// --- Common error factory functions ---

export function validationError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({ code: 'VALIDATION.SCHEMA', message, details });
}

/** Duplicate identity, name clash, or an already-pending invitation. */
export function conflictError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({ code: 'VALIDATION.CONFLICT', message, details });
}

export function authError(message = 'Invalid credentials'): TypedError {
  return createTypedError({ code: 'AUTH.UNAUTHENTICATED', message });
}

export function authorizationError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({ code: 'AUTH.FORBIDDEN', message, details });
}

export function notFoundError(resourceType: string, resourceId: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.NOT_FOUND',
    message: `${resourceType} not found: ${resourceId}`,
    details: { resourceType, resourceId },
  });
}

export function invalidTransitionError(resourceType: string, from: string, to: string): TypedError {
  return createTypedError({
    code: 'STATE.INVALID_TRANSITION',
    message: `Cannot transition ${resourceType} from "${from}" to "${to}"`,
    details: { resourceType, from, to },
  });
}

export function dependencyError(dependency: string, message: string): TypedError {
  return createTypedError({
    code: 'DEPENDENCY.UNAVAILABLE',
    message: `${dependency}: ${message}`,
    retryable: true,
    details: { dependency },
  });
}

export function rateLimitError(retryAfterMs: number, limit: number, windowMs: number): TypedError {
  const retryAfterSec = Math.ceil(retryAfterMs / 1000);
  return createTypedError({
    code: 'RATE_LIMIT.EXCEEDED',
    message: `Rate limit exceeded. Try again in ${retryAfterSec} seconds.`,
    retryable: true,
    details: { retryAfterMs, limit, windowMs },
  });
}

export function internalError(): TypedError {
  return createTypedError({ code: 'SYSTEM.INTERNAL', message: 'Internal server error' });
}

/** Map an error code to its HTTP status. */
export function httpStatusFor(error: TypedError): number {
  if (error.code.startsWith('AUTH.UNAUTHENTICATED')) return 401;
  if (error.code.startsWith('AUTH.')) return 403;
  if (error.code.includes('NOT_FOUND')) return 404;
  if (error.code === 'VALIDATION.CONFLICT') return 409;
  if (error.code.startsWith('VALIDATION.')) return 400;
  if (error.code.startsWith('STATE.')) return 409;
  if (error.code.startsWith('RATE_LIMIT.')) return 429;
  if (error.code.startsWith('DEPENDENCY.')) return 503;
  return 500;
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}
