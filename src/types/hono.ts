import type { AccessTokenClaims } from './token.js';

/**
 * Hono context variables shared by every route
 */
export interface AppVariables {
  session?: AccessTokenClaims;
}

export type AppEnv = { Variables: AppVariables };

/**
 * Variables available behind `requireSession`
 */
export interface SessionVariables extends AppVariables {
  session: AccessTokenClaims;
}

export type SessionEnv = { Variables: SessionVariables };

/**
 * Rate limit info
 */
export interface RateLimitInfo {
  allowed: boolean;
  limit: number;
  remaining: number;
  retryAfterMs: number;
}
