import { Hono } from 'hono';
import type { AppEnv } from '../../types/hono.js';
import { type Clock, systemClock } from '../../types/clock.js';
import type { OidcClient } from '../../federation/oidc-client.js';
import { openFlowState } from '../../federation/flow-state.js';
import type { IdentityService } from '../../services/identity-service.js';
import type { AccountService } from '../../services/account-service.js';
import type { AccessTokenService } from '../../services/access-token-service.js';
import type { Logger } from '../../logging/logger.js';
import { type TokenBucketRateLimiter, rateLimit } from '../../middleware/rate-limiter.js';
import { ApiError } from '../../errors/api-error.js';
import { constantTimeCompare } from '../../crypto/hash.js';
import {
  type CookieSettings,
  getFlowCookie,
  clearFlowCookie,
  setSessionCookies,
} from '../cookies.js';
import { sessionMetadata } from '../request-metadata.js';

export interface CallbackRoutesOptions {
  oidc?: OidcClient;
  identities: IdentityService;
  accounts: AccountService;
  accessTokens: AccessTokenService;
  refreshTtlSeconds: number;
  limiter: TokenBucketRateLimiter;
  cookies: CookieSettings;
  cookieEncryptionKey: string;
  flowTtlSeconds: number;
  frontendUrl: string;
  logger: Logger;
  now?: Clock;
}

/**
 * Create federation callback routes
 */
export function createCallbackRoutes(options: CallbackRoutesOptions): Hono<AppEnv> {
  const {
    oidc,
    identities,
    accounts,
    accessTokens,
    refreshTtlSeconds,
    limiter,
    cookies,
    cookieEncryptionKey,
    flowTtlSeconds,
    frontendUrl,
    logger,
  } = options;
  const now = options.now ?? systemClock;
  const app = new Hono<AppEnv>();

  /**
   * GET /auth/federated/callback
   * Finish the provider round trip and open a local session
   */
  app.get('/callback', rateLimit(limiter, 'auth'), async (c) => {
    if (!oidc) {
      throw ApiError.notFound('Federated login is not configured');
    }

    const error = c.req.query('error');
    if (error) {
      logger.warn('Identity provider returned an error', { providerError: error.slice(0, 100) });
      throw ApiError.authFailure('Authentication was denied by the identity provider');
    }

    const code = c.req.query('code');
    const state = c.req.query('state');
    if (!code) {
      throw ApiError.validation('Missing authorization code');
    }
    if (!state) {
      throw ApiError.validation('Missing state parameter');
    }

    const sealed = getFlowCookie(c);
    // The flow cookie is single use
    clearFlowCookie(c, cookies);

    const flow = sealed
      ? openFlowState(sealed, cookieEncryptionKey, now(), flowTtlSeconds * 1000)
      : null;
    if (!flow) {
      throw ApiError.authFailure('No authentication flow in progress');
    }

    if (!constantTimeCompare(state, flow.csrfToken)) {
      throw ApiError.authFailure('Invalid authentication state');
    }

    const idToken = await oidc.exchangeCode(code, flow.codeVerifier);
    const identity = await oidc.verifyIdToken(idToken, flow.nonce);

    if (!identity.emailVerified) {
      throw ApiError.authFailure('Email not verified by identity provider');
    }

    const user = await identities.resolveFederatedUser({
      externalId: identity.externalId,
      email: identity.email,
      name: identity.name,
      picture: identity.picture,
    });

    const grant = await accounts.grantSession(user, sessionMetadata(c));
    setSessionCookies(c, cookies, {
      accessToken: grant.accessToken,
      accessMaxAge: accessTokens.ttlSeconds,
      refreshSecret: grant.refresh.secret,
      refreshMaxAge: refreshTtlSeconds,
    });

    logger.info('Federated login', { userId: user.id });
    return c.redirect(`${frontendUrl}/auth/complete`, 302);
  });

  return app;
}
