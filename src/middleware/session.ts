import type { MiddlewareHandler } from 'hono';
import { getCookie } from 'hono/cookie';
import type { SessionEnv } from '../types/hono.js';
import type { AccessTokenService } from '../services/access-token-service.js';
import { ApiError } from '../errors/api-error.js';
import { COOKIE_ACCESS_SESSION } from '../config/constants.js';

/**
 * Require a valid access token, from the `access-session` cookie or a Bearer header.
 * Sets `session` for downstream handlers.
 */
export function requireSession(accessTokens: AccessTokenService): MiddlewareHandler<SessionEnv> {
  return async (c, next) => {
    const authorization = c.req.header('Authorization');
    const bearer = authorization?.startsWith('Bearer ') ? authorization.slice('Bearer '.length).trim() : undefined;
    const token = getCookie(c, COOKIE_ACCESS_SESSION) ?? bearer;

    if (!token) {
      throw ApiError.authFailure('Authentication required');
    }

    c.set('session', await accessTokens.verify(token));
    await next();
  };
}
