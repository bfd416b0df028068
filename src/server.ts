import { serve } from '@hono/node-server';
import { createAuthServer, createAuthServices } from './app.js';
import { getConfig } from './config/index.js';
import { createLogger } from './logging/logger.js';
import { createMemoryStorage } from './storage/memory/index.js';
import { createDrizzleStorage, closeDatabase } from './storage/drizzle/index.js';
import type { IStorage } from './storage/interfaces/index.js';
import { LogMailer } from './mail/mailer.js';
import { OidcClient } from './federation/oidc-client.js';
import { getProviderConfig } from './federation/providers.js';
import { TokenBucketRateLimiter } from './middleware/rate-limiter.js';
import { startCleanupJobs } from './services/cleanup-jobs.js';

// Load configuration
const config = getConfig();
const logger = createLogger(config.logging.level);

// Create storage based on environment
let storage: IStorage;

if (config.database.url) {
  logger.info('Using PostgreSQL storage');
  storage = createDrizzleStorage(config.database.url);
} else {
  logger.warn('Using in-memory storage (no DATABASE_URL configured); data is lost on restart');
  storage = createMemoryStorage();
}

const services = createAuthServices({
  storage,
  mailer: new LogMailer({
    logger,
    frontendUrl: config.server.frontendUrl,
    exposeLinks: config.server.environment === 'development',
  }),
  logger,
  jwtSecret: config.secrets.jwtSecret,
  lifetimes: config.lifetimes,
  passwordHashCost: config.security.passwordHashCost,
});

const oidc = config.oidc
  ? new OidcClient({
      provider: getProviderConfig(config.oidc),
      clientId: config.oidc.clientId,
      clientSecret: config.oidc.clientSecret,
      redirectUrl: config.oidc.redirectUrl,
    })
  : undefined;

const limiter = new TokenBucketRateLimiter();

const app = createAuthServer({
  storage,
  services,
  logger,
  config,
  limiter,
  oidc,
  enableLogging: config.server.environment !== 'test',
});

const jobs = startCleanupJobs({
  storage,
  refreshSessions: services.refreshSessions,
  actionTokens: services.actionTokens,
  logger,
  sweepRateLimiter: () => limiter.sweep(),
});

// Start server
const server = serve(
  {
    fetch: app.fetch,
    port: config.server.port,
    hostname: config.server.host,
  },
  (info) => {
    logger.info('Auth service listening', {
      address: info.address,
      port: info.port,
      environment: config.server.environment,
      federation: oidc ? config.oidc?.provider : 'disabled',
    });
  }
);

function shutdown(signal: string): void {
  logger.info('Shutting down', { signal });
  jobs.stop();
  server.close(() => {
    closeDatabase()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error('Failed to close database', { error: err });
        process.exit(1);
      });
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
