import { Hono } from 'hono';
import type { AppEnv } from '../../types/hono.js';
import { toUserProfile } from '../../types/user.js';
import type { AccountService } from '../../services/account-service.js';
import type { AccessTokenService } from '../../services/access-token-service.js';
import { type TokenBucketRateLimiter, rateLimit } from '../../middleware/rate-limiter.js';
import { requireSession } from '../../middleware/session.js';
import { ApiError } from '../../errors/api-error.js';
import { type CookieSettings, setSessionCookies, clearSessionCookies, getRefreshCookie } from '../cookies.js';

export interface SessionRoutesOptions {
  accounts: AccountService;
  accessTokens: AccessTokenService;
  refreshTtlSeconds: number;
  limiter: TokenBucketRateLimiter;
  cookies: CookieSettings;
}

/**
 * Create session routes: refresh, logout and the signed-in user
 */
export function createSessionRoutes(options: SessionRoutesOptions): Hono<AppEnv> {
  const { accounts, accessTokens, refreshTtlSeconds, limiter, cookies } = options;
  const app = new Hono<AppEnv>();
  const general = rateLimit(limiter, 'general');

  /**
   * POST /auth/refresh
   * Rotates the refresh cookie and mints a new access token
   */
  app.post('/refresh', general, async (c) => {
    const secret = getRefreshCookie(c);
    if (!secret) {
      throw ApiError.authFailure('No refresh token');
    }

    const grant = await accounts.refresh(secret);

    setSessionCookies(c, cookies, {
      accessToken: grant.accessToken,
      accessMaxAge: accessTokens.ttlSeconds,
      refreshSecret: grant.refresh.secret,
      refreshMaxAge: refreshTtlSeconds,
    });

    return c.json({ token: grant.accessToken, message: 'Token refreshed successfully' });
  });

  /**
   * POST /auth/logout
   * Always succeeds
   */
  app.post('/logout', general, async (c) => {
    await accounts.logout(getRefreshCookie(c));
    clearSessionCookies(c, cookies);
    return c.json({ message: 'Logged out successfully' });
  });

  /**
   * GET /auth/me
   */
  app.get('/me', general, requireSession(accessTokens), async (c) => {
    const user = await accounts.getUser(c.get('session').sub);
    return c.json({ user: toUserProfile(user) });
  });

  /**
   * GET /auth/sessions
   */
  app.get('/sessions', general, requireSession(accessTokens), async (c) => {
    const sessions = await accounts.listSessions(c.get('session').sub);
    return c.json({ sessions });
  });

  /**
   * POST /auth/logout-all
   * Ends every refresh session of the signed-in user
   */
  app.post('/logout-all', general, requireSession(accessTokens), async (c) => {
    const revoked = await accounts.logoutAll(c.get('session').sub);
    clearSessionCookies(c, cookies);
    return c.json({ message: 'Logged out of all sessions', revoked });
  });

  return app;
}
