import {
  type ApiErrorCode,
  type ApiErrorStatus,
  ERROR_STATUS_CODES,
  ERROR_MESSAGES,
  ERROR_AUTH_FAILURE,
  ERROR_VALIDATION_FAILURE,
  ERROR_CONFLICT,
  ERROR_NOT_FOUND,
  ERROR_RATE_LIMITED,
  ERROR_PROVIDER_FAILURE,
  ERROR_INTERNAL,
} from './error-codes.js';

/**
 * Error response body
 */
export interface ApiErrorResponse {
  error: ApiErrorCode;
  message: string;
}

/**
 * Error raised by services and handlers; rendered by the global error handler
 */
export class ApiError extends Error {
  public readonly code: ApiErrorCode;
  public readonly statusCode: ApiErrorStatus;
  public readonly retryAfterSeconds?: number;

  constructor(
    code: ApiErrorCode,
    message?: string,
    options?: {
      cause?: unknown;
      retryAfterSeconds?: number;
    }
  ) {
    super(message ?? ERROR_MESSAGES[code]);
    this.name = 'ApiError';
    this.code = code;
    this.statusCode = ERROR_STATUS_CODES[code];

    if (options?.retryAfterSeconds !== undefined) {
      this.retryAfterSeconds = options.retryAfterSeconds;
    }
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to JSON response body
   */
  toJSON(): ApiErrorResponse {
    return {
      error: this.code,
      message: this.message,
    };
  }

  // Factory methods

  static authFailure(message?: string): ApiError {
    return new ApiError(ERROR_AUTH_FAILURE, message);
  }

  static validation(message?: string): ApiError {
    return new ApiError(ERROR_VALIDATION_FAILURE, message);
  }

  static conflict(message?: string): ApiError {
    return new ApiError(ERROR_CONFLICT, message);
  }

  static notFound(message?: string): ApiError {
    return new ApiError(ERROR_NOT_FOUND, message);
  }

  static rateLimited(retryAfterSeconds: number): ApiError {
    return new ApiError(ERROR_RATE_LIMITED, undefined, { retryAfterSeconds });
  }

  static providerFailure(message?: string, cause?: unknown): ApiError {
    return new ApiError(ERROR_PROVIDER_FAILURE, message, { cause });
  }

  static internal(message?: string, cause?: unknown): ApiError {
    return new ApiError(ERROR_INTERNAL, message, { cause });
  }
}

export function isApiError(err: unknown): err is ApiError {
  return err instanceof ApiError;
}
