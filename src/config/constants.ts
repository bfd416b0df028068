/**
 * Session and identity constants
 */

// Cookie names
export const COOKIE_ACCESS_SESSION = 'access-session' as const;
export const COOKIE_REFRESH_SESSION = 'refresh-session' as const;
export const COOKIE_OIDC_FLOW = 'oidc-flow' as const;

// Default lifetimes
export const DEFAULT_ACCESS_TOKEN_TTL_HOURS = 24;
export const DEFAULT_REFRESH_TOKEN_TTL_DAYS = 30;
export const DEFAULT_EMAIL_VERIFICATION_TTL_HOURS = 24;
export const DEFAULT_PASSWORD_RESET_TTL_HOURS = 1;
export const DEFAULT_OIDC_FLOW_TTL_MINUTES = 10;

// scrypt CPU/memory cost (N)
export const DEFAULT_PASSWORD_HASH_COST = 16384;

// scrypt N must be a power of two; 16384 is the largest that fits the default 32 MiB maxmem at r = 8
export const MIN_PASSWORD_HASH_COST = 1024;
export const MAX_PASSWORD_HASH_COST = 16384;

// Minimum response time for credential and enumeration sensitive endpoints
export const DEFAULT_TIMING_FLOOR_MS = 250;

// Rate limit tiers (tokens per second, bucket size)
export const RATE_LIMIT_TIERS = {
  sensitive: { ratePerSecond: 2, burst: 3 },
  auth: { ratePerSecond: 5, burst: 5 },
  general: { ratePerSecond: 10, burst: 20 },
} as const;

// Background jobs
export const TOKEN_CLEANUP_OFFSET_MS = 60 * 60 * 1000;
export const TOKEN_CLEANUP_INTERVAL_MS = 6 * 60 * 60 * 1000;
export const UNVERIFIED_CLEANUP_OFFSET_MS = 2 * 60 * 60 * 1000;
export const UNVERIFIED_CLEANUP_INTERVAL_MS = 24 * 60 * 60 * 1000;
export const UNVERIFIED_ACCOUNT_MAX_AGE_DAYS = 7;
export const RATE_LIMIT_SWEEP_INTERVAL_MS = 60 * 1000;

// Usernames
export const USERNAME_MIN_LENGTH = 3;
export const USERNAME_MAX_LENGTH = 30;
export const USERNAME_FALLBACK = 'user';

// Passwords
export const PASSWORD_MIN_LENGTH = 8;
export const PASSWORD_MAX_LENGTH = 128;

// Emails
export const EMAIL_MAX_LENGTH = 254;

// OIDC scopes requested from the identity provider
export const OIDC_SCOPES = ['openid', 'email', 'profile'] as const;

// Response headers
export const HEADER_CACHE_CONTROL = 'Cache-Control' as const;
export const HEADER_PRAGMA = 'Pragma' as const;
export const NO_STORE_CACHE_CONTROL = 'no-store' as const;
export const NO_CACHE_PRAGMA = 'no-cache' as const;
