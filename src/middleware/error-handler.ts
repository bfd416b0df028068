import type { ErrorHandler, MiddlewareHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { AppEnv } from '../types/hono.js';
import type { Logger } from '../logging/logger.js';
import { ApiError } from '../errors/api-error.js';
import {
  NO_STORE_CACHE_CONTROL,
  NO_CACHE_PRAGMA,
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
} from '../config/constants.js';

/**
 * Global error handler
 *
 * Renders ApiError as `{ error, message }`; anything else becomes an opaque 500
 */
export function createErrorHandler(logger: Logger): ErrorHandler<AppEnv> {
  return (err, c) => {
    c.header(HEADER_CACHE_CONTROL, NO_STORE_CACHE_CONTROL);
    c.header(HEADER_PRAGMA, NO_CACHE_PRAGMA);

    if (err instanceof ApiError) {
      if (err.statusCode >= 500) {
        logger.error('Request failed', { path: c.req.path, code: err.code, error: err.cause ?? err });
      } else {
        logger.debug('Request rejected', { path: c.req.path, code: err.code, message: err.message });
      }
      if (err.retryAfterSeconds !== undefined) {
        c.header('Retry-After', String(err.retryAfterSeconds));
      }
      return c.json(err.toJSON(), err.statusCode);
    }

    // Malformed bodies rejected by hono's validator
    if (err instanceof HTTPException && err.status === 400) {
      return c.json(ApiError.validation(err.message || undefined).toJSON(), 400);
    }

    logger.error('Unhandled error', { path: c.req.path, error: err });
    return c.json(ApiError.internal().toJSON(), 500);
  };
}

/**
 * Security headers middleware
 */
export function securityHeaders(options: { hsts: boolean }): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    await next();

    c.header('X-Frame-Options', 'DENY');
    c.header('X-Content-Type-Options', 'nosniff');
    c.header('Referrer-Policy', 'strict-origin-when-cross-origin');

    if (options.hsts) {
      c.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
  };
}

/**
 * Request logging middleware
 */
export function requestLogger(logger: Logger): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    // Path only; query strings can carry tokens
    logger.info('request', {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      duration: Date.now() - start,
    });
  };
}
