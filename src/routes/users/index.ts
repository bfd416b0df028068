import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { SessionEnv } from '../../types/hono.js';
import { toUserProfile } from '../../types/user.js';
import type { AccountService } from '../../services/account-service.js';
import type { AccessTokenService } from '../../services/access-token-service.js';
import { type TokenBucketRateLimiter, rateLimit } from '../../middleware/rate-limiter.js';
import { requireSession } from '../../middleware/session.js';
import { timingFloor } from '../../middleware/timing.js';
import { type CookieSettings, clearSessionCookies } from '../cookies.js';
import { changePasswordSchema, updateProfileSchema, validationHook } from '../validation.js';

export interface UserRoutesOptions {
  accounts: AccountService;
  accessTokens: AccessTokenService;
  limiter: TokenBucketRateLimiter;
  timingFloorMs: number;
  cookies: CookieSettings;
}

/**
 * Create routes for the signed-in user's own account
 */
export function createUserRoutes(options: UserRoutesOptions): Hono<SessionEnv> {
  const { accounts, accessTokens, limiter, timingFloorMs, cookies } = options;
  const app = new Hono<SessionEnv>();

  app.use('*', requireSession(accessTokens));

  /**
   * POST /users/me/password
   * Ends every session, including the caller's
   */
  app.post(
    '/me/password',
    rateLimit(limiter, 'auth'),
    timingFloor(timingFloorMs),
    zValidator('json', changePasswordSchema, validationHook),
    async (c) => {
      const { current_password, new_password } = c.req.valid('json');
      await accounts.changePassword(c.get('session').sub, current_password, new_password);
      clearSessionCookies(c, cookies);
      return c.json({ message: 'Password changed successfully. Please log in again.' });
    }
  );

  /**
   * PATCH /users/me
   */
  app.patch(
    '/me',
    rateLimit(limiter, 'general'),
    zValidator('json', updateProfileSchema, validationHook),
    async (c) => {
      const user = await accounts.updateUsername(c.get('session').sub, c.req.valid('json').username);
      return c.json({ user: toUserProfile(user) });
    }
  );

  /**
   * DELETE /users/me
   */
  app.delete('/me', rateLimit(limiter, 'general'), async (c) => {
    await accounts.deleteAccount(c.get('session').sub);
    clearSessionCookies(c, cookies);
    return c.json({ message: 'Account deleted' });
  });

  return app;
}
