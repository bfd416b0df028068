import { Hono } from 'hono';
import type { AppEnv } from '../../types/hono.js';
import type { OidcClient } from '../../federation/oidc-client.js';
import { sealFlowState } from '../../federation/flow-state.js';
import { type TokenBucketRateLimiter, rateLimit } from '../../middleware/rate-limiter.js';
import { ApiError } from '../../errors/api-error.js';
import { type CookieSettings, setFlowCookie } from '../cookies.js';

export interface InitiateRoutesOptions {
  oidc?: OidcClient;
  limiter: TokenBucketRateLimiter;
  cookies: CookieSettings;
  cookieEncryptionKey: string;
  flowTtlSeconds: number;
}

/**
 * Create federation initiation routes
 */
export function createInitiateRoutes(options: InitiateRoutesOptions): Hono<AppEnv> {
  const { oidc, limiter, cookies, cookieEncryptionKey, flowTtlSeconds } = options;
  const app = new Hono<AppEnv>();

  /**
   * GET /auth/federated
   * Seal the flow state into a cookie and send the browser to the provider
   */
  app.get('/', rateLimit(limiter, 'auth'), (c) => {
    if (!oidc) {
      throw ApiError.notFound('Federated login is not configured');
    }

    const { url, flow } = oidc.createAuthorizationRequest();
    setFlowCookie(c, cookies, sealFlowState(flow, cookieEncryptionKey), flowTtlSeconds);

    return c.redirect(url, 302);
  });

  return app;
}
