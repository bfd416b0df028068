import { readFileSync, existsSync } from 'node:fs';
import * as constants from './constants.js';

export type Environment = 'development' | 'production' | 'test';
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';
export type OidcProviderKind = 'google' | 'generic_oidc';

type Env = Record<string, string | undefined>;

const DEV_JWT_SECRET = 'dev-jwt-secret-change-in-production';
const DEV_COOKIE_ENCRYPTION_KEY = 'dev-cookie-key-change-in-production';

/**
 * Read a secret from file (Docker secrets) or environment variable
 * Supports both `VAR_FILE` (path to file) and `VAR` (direct value) patterns
 */
export function readSecret(envVar: string, env: Env = process.env): string | undefined {
  const filePath = env[`${envVar}_FILE`];

  if (filePath && existsSync(filePath)) {
    try {
      return readFileSync(filePath, 'utf-8').trim();
    } catch {
      console.warn(`Warning: Could not read secret from ${filePath}`);
    }
  }

  return env[envVar] || undefined;
}

function parseInteger(value: string | undefined, fallback: number): number {
  if (value === undefined || value === '') {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new Error(`Invalid non-negative integer in configuration: "${value}"`);
  }
  return parsed;
}

function parseHashCost(value: string | undefined): number {
  const cost = parseInteger(value, constants.DEFAULT_PASSWORD_HASH_COST);
  const powerOfTwo = (cost & (cost - 1)) === 0;
  if (!powerOfTwo || cost < constants.MIN_PASSWORD_HASH_COST || cost > constants.MAX_PASSWORD_HASH_COST) {
    throw new Error(
      `PASSWORD_HASH_COST must be a power of two between ${constants.MIN_PASSWORD_HASH_COST} and ${constants.MAX_PASSWORD_HASH_COST}, got ${cost}`
    );
  }
  return cost;
}

function parseEnvironment(value: string | undefined): Environment {
  switch (value) {
    case 'production':
    case 'test':
      return value;
    default:
      return 'development';
  }
}

function parseLogLevel(value: string | undefined): LogLevel {
  switch (value) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
    case 'silent':
      return value;
    default:
      return 'info';
  }
}

/**
 * OpenID Connect relying party settings; absent when federation is not configured
 */
export interface OidcConfig {
  provider: OidcProviderKind;
  clientId: string;
  clientSecret: string;
  redirectUrl: string;
  issuer?: string;
  authorizationEndpoint?: string;
  tokenEndpoint?: string;
  jwksUri?: string;
}

/**
 * Application configuration loaded from environment
 */
export interface Config {
  server: {
    port: number;
    host: string;
    environment: Environment;
    frontendUrl: string;
  };
  database: {
    url: string | undefined;
  };
  secrets: {
    jwtSecret: string;
    cookieEncryptionKey: string;
  };
  logging: {
    level: LogLevel;
  };
  cookies: {
    domain: string | undefined;
  };
  lifetimes: {
    accessTokenHours: number;
    refreshTokenDays: number;
    emailVerificationHours: number;
    passwordResetHours: number;
    oidcFlowMinutes: number;
  };
  security: {
    passwordHashCost: number;
    timingFloorMs: number;
  };
  oidc: OidcConfig | undefined;
}

function loadOidcConfig(env: Env): OidcConfig | undefined {
  const clientId = env['OIDC_CLIENT_ID'];
  const clientSecret = readSecret('OIDC_CLIENT_SECRET', env);
  const redirectUrl = env['OIDC_REDIRECT_URL'];

  if (!clientId || !clientSecret || !redirectUrl) {
    return undefined;
  }

  return {
    provider: env['OIDC_PROVIDER'] === 'generic_oidc' ? 'generic_oidc' : 'google',
    clientId,
    clientSecret,
    redirectUrl,
    issuer: env['OIDC_ISSUER'],
    authorizationEndpoint: env['OIDC_AUTHORIZATION_ENDPOINT'],
    tokenEndpoint: env['OIDC_TOKEN_ENDPOINT'],
    jwksUri: env['OIDC_JWKS_URI'],
  };
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: Env = process.env): Config {
  const environment = parseEnvironment(env['APP_ENV'] ?? env['NODE_ENV']);

  let jwtSecret = readSecret('JWT_SECRET', env);
  let cookieEncryptionKey = readSecret('COOKIE_ENCRYPTION_KEY', env);

  if (environment === 'development') {
    jwtSecret ??= DEV_JWT_SECRET;
    cookieEncryptionKey ??= DEV_COOKIE_ENCRYPTION_KEY;
  }
  if (!jwtSecret) {
    throw new Error('JWT_SECRET must be set outside development');
  }
  if (!cookieEncryptionKey) {
    throw new Error('COOKIE_ENCRYPTION_KEY must be set outside development');
  }

  return {
    server: {
      port: parseInteger(env['PORT'], 3000),
      host: env['HOST'] ?? '0.0.0.0',
      environment,
      frontendUrl: (env['FRONTEND_URL'] ?? 'http://localhost:5173').replace(/\/+$/, ''),
    },
    database: {
      url: env['DATABASE_URL'] || undefined,
    },
    secrets: {
      jwtSecret,
      cookieEncryptionKey,
    },
    logging: {
      level: parseLogLevel(env['LOG_LEVEL']),
    },
    cookies: {
      domain: env['COOKIE_DOMAIN'] || undefined,
    },
    lifetimes: {
      accessTokenHours: parseInteger(env['ACCESS_TOKEN_TTL_HOURS'], constants.DEFAULT_ACCESS_TOKEN_TTL_HOURS),
      refreshTokenDays: parseInteger(env['REFRESH_TOKEN_TTL_DAYS'], constants.DEFAULT_REFRESH_TOKEN_TTL_DAYS),
      emailVerificationHours: parseInteger(
        env['EMAIL_VERIFICATION_TTL_HOURS'],
        constants.DEFAULT_EMAIL_VERIFICATION_TTL_HOURS
      ),
      passwordResetHours: parseInteger(env['PASSWORD_RESET_TTL_HOURS'], constants.DEFAULT_PASSWORD_RESET_TTL_HOURS),
      oidcFlowMinutes: parseInteger(env['OIDC_FLOW_TTL_MINUTES'], constants.DEFAULT_OIDC_FLOW_TTL_MINUTES),
    },
    security: {
      passwordHashCost: parseHashCost(env['PASSWORD_HASH_COST']),
      timingFloorMs: parseInteger(env['TIMING_FLOOR_MS'], constants.DEFAULT_TIMING_FLOOR_MS),
    },
    oidc: loadOidcConfig(env),
  };
}

// Singleton config instance
let config: Config | null = null;

/**
 * Get the current configuration (loads if not already loaded)
 */
export function getConfig(): Config {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  config = null;
}

// Re-export constants
export { constants };
