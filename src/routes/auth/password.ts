import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { AppEnv } from '../../types/hono.js';
import { toUserProfile } from '../../types/user.js';
import type { AccountService } from '../../services/account-service.js';
import type { AccessTokenService } from '../../services/access-token-service.js';
import { type TokenBucketRateLimiter, rateLimit } from '../../middleware/rate-limiter.js';
import { timingFloor } from '../../middleware/timing.js';
import { type CookieSettings, setSessionCookies } from '../cookies.js';
import { sessionMetadata } from '../request-metadata.js';
import {
  registerSchema,
  loginSchema,
  emailOnlySchema,
  resetPasswordSchema,
  verifyEmailQuerySchema,
  validationHook,
} from '../validation.js';

export const MESSAGE_REGISTERED =
  'Registration received. If the details are valid, please check your email to verify your account.';
export const MESSAGE_RESET_REQUESTED =
  'If an account exists for this email, a password reset link has been sent.';
export const MESSAGE_PASSWORD_RESET = 'Password has been reset successfully.';
export const MESSAGE_VERIFICATION_RESENT =
  'If an unverified account exists for this email, a verification link has been sent.';
export const MESSAGE_EMAIL_VERIFIED = 'Email verified successfully. You can now log in.';
export const MESSAGE_EMAIL_VERIFICATION_PROCESSED = 'Email verification processed successfully.';

export interface PasswordRoutesOptions {
  accounts: AccountService;
  accessTokens: AccessTokenService;
  refreshTtlSeconds: number;
  limiter: TokenBucketRateLimiter;
  timingFloorMs: number;
  cookies: CookieSettings;
}

/**
 * Create password account routes
 */
export function createPasswordRoutes(options: PasswordRoutesOptions): Hono<AppEnv> {
  const { accounts, accessTokens, refreshTtlSeconds, limiter, timingFloorMs, cookies } = options;
  const app = new Hono<AppEnv>();

  /**
   * POST /auth/register
   * Same answer whether or not an account was created
   */
  app.post(
    '/register',
    rateLimit(limiter, 'auth'),
    timingFloor(timingFloorMs),
    zValidator('json', registerSchema, validationHook),
    async (c) => {
      await accounts.register(c.req.valid('json'));
      return c.json({ message: MESSAGE_REGISTERED });
    }
  );

  /**
   * POST /auth/login
   */
  app.post(
    '/login',
    rateLimit(limiter, 'auth'),
    timingFloor(timingFloorMs),
    zValidator('json', loginSchema, validationHook),
    async (c) => {
      const { email, password } = c.req.valid('json');
      const grant = await accounts.login(email, password, sessionMetadata(c));

      setSessionCookies(c, cookies, {
        accessToken: grant.accessToken,
        accessMaxAge: accessTokens.ttlSeconds,
        refreshSecret: grant.refresh.secret,
        refreshMaxAge: refreshTtlSeconds,
      });

      return c.json({
        token: grant.accessToken,
        refresh_token: grant.refresh.secret,
        user: toUserProfile(grant.user),
      });
    }
  );

  /**
   * POST /auth/request-password-reset
   */
  app.post(
    '/request-password-reset',
    rateLimit(limiter, 'sensitive'),
    timingFloor(timingFloorMs),
    zValidator('json', emailOnlySchema, validationHook),
    async (c) => {
      await accounts.requestPasswordReset(c.req.valid('json').email);
      return c.json({ message: MESSAGE_RESET_REQUESTED });
    }
  );

  /**
   * POST /auth/reset-password
   */
  app.post(
    '/reset-password',
    rateLimit(limiter, 'auth'),
    timingFloor(timingFloorMs),
    zValidator('json', resetPasswordSchema, validationHook),
    async (c) => {
      const { token, new_password } = c.req.valid('json');
      await accounts.resetPassword(token, new_password);
      return c.json({ message: MESSAGE_PASSWORD_RESET });
    }
  );

  /**
   * POST /auth/resend-verification
   */
  app.post(
    '/resend-verification',
    rateLimit(limiter, 'sensitive'),
    timingFloor(timingFloorMs),
    zValidator('json', emailOnlySchema, validationHook),
    async (c) => {
      await accounts.resendVerification(c.req.valid('json').email);
      return c.json({ message: MESSAGE_VERIFICATION_RESENT });
    }
  );

  /**
   * GET /auth/verify-email?token=...
   * 200 for every token; only the message says whether this call verified the address
   */
  app.get(
    '/verify-email',
    rateLimit(limiter, 'general'),
    zValidator('query', verifyEmailQuerySchema, validationHook),
    async (c) => {
      const verified = await accounts.verifyEmail(c.req.valid('query').token);
      return c.json({
        message: verified ? MESSAGE_EMAIL_VERIFIED : MESSAGE_EMAIL_VERIFICATION_PROCESSED,
        verified,
      });
    }
  );

  return app;
}
