import { Hono } from 'hono';
import type { AppEnv } from '../../types/hono.js';
import { createInitiateRoutes } from './initiate.js';
import { createCallbackRoutes, type CallbackRoutesOptions } from './callback.js';

export type FederationRoutesOptions = CallbackRoutesOptions;

/**
 * Create federated login routes
 *
 * Routes:
 * - GET /auth/federated - Redirect to the identity provider
 * - GET /auth/federated/callback - Handle the provider's redirect back
 */
export function createFederationRoutes(options: FederationRoutesOptions): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.route('/', createInitiateRoutes(options));
  app.route('/', createCallbackRoutes(options));

  return app;
}

export * from './initiate.js';
export * from './callback.js';
