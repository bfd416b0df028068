import { Hono } from 'hono';
import type { AppEnv } from '../../types/hono.js';
import { createPasswordRoutes, type PasswordRoutesOptions } from './password.js';
import { createSessionRoutes } from './session.js';

export { createPasswordRoutes, type PasswordRoutesOptions } from './password.js';
export { createSessionRoutes, type SessionRoutesOptions } from './session.js';

export type AuthRoutesOptions = PasswordRoutesOptions;

/**
 * Create all /auth routes except federation
 */
export function createAuthRoutes(options: AuthRoutesOptions): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  app.route('/', createPasswordRoutes(options));
  app.route('/', createSessionRoutes(options));
  return app;
}
