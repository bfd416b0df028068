/**
 * API error codes
 */

export const ERROR_AUTH_FAILURE = 'auth_failure' as const;
export const ERROR_VALIDATION_FAILURE = 'validation_failure' as const;
export const ERROR_CONFLICT = 'conflict' as const;
export const ERROR_NOT_FOUND = 'not_found' as const;
export const ERROR_RATE_LIMITED = 'rate_limited' as const;
export const ERROR_PROVIDER_FAILURE = 'provider_failure' as const;
export const ERROR_INTERNAL = 'internal_error' as const;

/**
 * All API error codes
 */
export type ApiErrorCode =
  | typeof ERROR_AUTH_FAILURE
  | typeof ERROR_VALIDATION_FAILURE
  | typeof ERROR_CONFLICT
  | typeof ERROR_NOT_FOUND
  | typeof ERROR_RATE_LIMITED
  | typeof ERROR_PROVIDER_FAILURE
  | typeof ERROR_INTERNAL;

/**
 * HTTP statuses the API answers errors with
 */
export type ApiErrorStatus = 400 | 401 | 404 | 409 | 429 | 500 | 502;

/**
 * HTTP status codes for API errors
 */
export const ERROR_STATUS_CODES: Record<ApiErrorCode, ApiErrorStatus> = {
  [ERROR_AUTH_FAILURE]: 401,
  [ERROR_VALIDATION_FAILURE]: 400,
  [ERROR_CONFLICT]: 409,
  [ERROR_NOT_FOUND]: 404,
  [ERROR_RATE_LIMITED]: 429,
  [ERROR_PROVIDER_FAILURE]: 502,
  [ERROR_INTERNAL]: 500,
};

/**
 * Default error messages
 */
export const ERROR_MESSAGES: Record<ApiErrorCode, string> = {
  [ERROR_AUTH_FAILURE]: 'Authentication failed',
  [ERROR_VALIDATION_FAILURE]: 'Invalid request',
  [ERROR_CONFLICT]: 'Resource already exists',
  [ERROR_NOT_FOUND]: 'Resource not found',
  [ERROR_RATE_LIMITED]: 'Too many requests. Please try again later.',
  [ERROR_PROVIDER_FAILURE]: 'Identity provider request failed',
  [ERROR_INTERNAL]: 'An unexpected error occurred',
};
