import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { AppEnv } from './types/hono.js';
import { type Clock, systemClock } from './types/clock.js';
import type { Config } from './config/index.js';
import type { IStorage } from './storage/interfaces/index.js';
import type { IMailer } from './mail/mailer.js';
import type { Logger } from './logging/logger.js';
import type { OidcClient } from './federation/oidc-client.js';
import { createErrorHandler, securityHeaders, requestLogger } from './middleware/error-handler.js';
import { TokenBucketRateLimiter } from './middleware/rate-limiter.js';
import { ApiError } from './errors/api-error.js';
import { CredentialService } from './services/credential-service.js';
import { AccessTokenService } from './services/access-token-service.js';
import { RefreshSessionService } from './services/refresh-session-service.js';
import { ActionTokenService } from './services/action-token-service.js';
import { AccountService } from './services/account-service.js';
import { IdentityService } from './services/identity-service.js';
import { createCookieSettings } from './routes/cookies.js';
import { createAuthRoutes } from './routes/auth/index.js';
import { createUserRoutes } from './routes/users/index.js';
import { createFederationRoutes } from './routes/federation/index.js';
import { createHealthRoutes } from './routes/health.js';

export interface AuthServicesOptions {
  storage: IStorage;
  mailer: IMailer;
  logger: Logger;
  jwtSecret: string;
  lifetimes: Config['lifetimes'];
  passwordHashCost: number;
  now?: Clock;
}

/**
 * The services behind the HTTP routes and the cleanup jobs
 */
export interface AuthServices {
  credentials: CredentialService;
  accessTokens: AccessTokenService;
  refreshSessions: RefreshSessionService;
  actionTokens: ActionTokenService;
  accounts: AccountService;
  identities: IdentityService;
}

export function createAuthServices(options: AuthServicesOptions): AuthServices {
  const { storage, mailer, logger, lifetimes } = options;
  const now = options.now ?? systemClock;

  const credentials = new CredentialService(options.passwordHashCost);
  const accessTokens = new AccessTokenService({
    secret: options.jwtSecret,
    ttlHours: lifetimes.accessTokenHours,
    now,
  });
  const refreshSessions = new RefreshSessionService({
    storage,
    ttlDays: lifetimes.refreshTokenDays,
    logger,
    now,
  });
  const actionTokens = new ActionTokenService({
    storage,
    ttlHours: {
      email_verification: lifetimes.emailVerificationHours,
      password_reset: lifetimes.passwordResetHours,
    },
    now,
  });

  return {
    credentials,
    accessTokens,
    refreshSessions,
    actionTokens,
    accounts: new AccountService({
      storage,
      credentials,
      accessTokens,
      refreshSessions,
      actionTokens,
      mailer,
      logger,
    }),
    identities: new IdentityService({ storage, logger }),
  };
}

export interface AuthServerOptions {
  storage: IStorage;
  services: AuthServices;
  logger: Logger;
  config: Pick<Config, 'server' | 'secrets' | 'cookies' | 'lifetimes' | 'security'>;
  limiter?: TokenBucketRateLimiter;
  /**
   * Relying party for federated login; the federated routes answer 404 without one
   */
  oidc?: OidcClient;
  enableLogging?: boolean;
  now?: Clock;
}

/**
 * Create the authentication service application
 */
export function createAuthServer(options: AuthServerOptions): Hono<AppEnv> {
  const { storage, services, logger, config, oidc, enableLogging = true } = options;
  const limiter = options.limiter ?? new TokenBucketRateLimiter();
  const now = options.now ?? systemClock;

  const cookies = createCookieSettings(config.server.environment, config.cookies.domain);
  const refreshTtlSeconds = services.refreshSessions.ttlSeconds;
  const timingFloorMs = config.security.timingFloorMs;

  const app = new Hono<AppEnv>();

  // Global error handler
  app.onError(createErrorHandler(logger));

  // Security headers
  app.use('*', securityHeaders({ hsts: config.server.environment === 'production' }));

  // Logging
  if (enableLogging) {
    app.use('*', requestLogger(logger));
  }

  // CORS for the browser front end, cookies included
  app.use(
    '*',
    cors({
      origin: config.server.frontendUrl,
      credentials: true,
      allowMethods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
      allowHeaders: ['Authorization', 'Content-Type'],
      exposeHeaders: ['Retry-After', 'X-RateLimit-Limit', 'X-RateLimit-Remaining'],
      maxAge: 86400,
    })
  );

  // Health checks
  app.route('/health', createHealthRoutes({ storage, logger }));

  app.route(
    '/auth/federated',
    createFederationRoutes({
      oidc,
      identities: services.identities,
      accounts: services.accounts,
      accessTokens: services.accessTokens,
      refreshTtlSeconds,
      limiter,
      cookies,
      cookieEncryptionKey: config.secrets.cookieEncryptionKey,
      flowTtlSeconds: config.lifetimes.oidcFlowMinutes * 60,
      frontendUrl: config.server.frontendUrl,
      logger,
      now,
    })
  );

  app.route(
    '/auth',
    createAuthRoutes({
      accounts: services.accounts,
      accessTokens: services.accessTokens,
      refreshTtlSeconds,
      limiter,
      timingFloorMs,
      cookies,
    })
  );

  app.route(
    '/users',
    createUserRoutes({
      accounts: services.accounts,
      accessTokens: services.accessTokens,
      limiter,
      timingFloorMs,
      cookies,
    })
  );

  app.notFound((c) => c.json(ApiError.notFound('Not found').toJSON(), 404));

  return app;
}
