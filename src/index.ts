export { createAuthServer, createAuthServices } from './app.js';
export type { AuthServerOptions, AuthServices, AuthServicesOptions } from './app.js';

export { loadConfig, getConfig, resetConfig, readSecret } from './config/index.js';
export type { Config, OidcConfig, Environment, LogLevel } from './config/index.js';

export { ApiError, isApiError } from './errors/index.js';
export type { ApiErrorCode } from './errors/index.js';

export { createLogger } from './logging/logger.js';
export type { Logger } from './logging/logger.js';

export { LogMailer } from './mail/mailer.js';
export type { IMailer } from './mail/mailer.js';

export { createMemoryStorage, MemoryStorage } from './storage/memory/index.js';
export { createDrizzleStorage, DrizzleStorage, closeDatabase } from './storage/drizzle/index.js';
export type { IStorage, IUserStorage, IRefreshTokenStorage, IActionTokenStorage } from './storage/interfaces/index.js';

export { OidcClient } from './federation/oidc-client.js';
export { getProviderConfig, providerTemplates } from './federation/providers.js';

export { TokenBucketRateLimiter } from './middleware/rate-limiter.js';
export { startCleanupJobs, cleanupTokens, cleanupUnverifiedAccounts } from './services/cleanup-jobs.js';

export * from './types/index.js';
