import { Hono } from 'hono';
import type { AppEnv } from '../types/hono.js';
import type { IStorage } from '../storage/interfaces/index.js';
import type { Logger } from '../logging/logger.js';

export interface HealthRoutesOptions {
  storage: IStorage;
  logger: Logger;
}

export function createHealthRoutes(options: HealthRoutesOptions): Hono<AppEnv> {
  const { storage, logger } = options;
  const app = new Hono<AppEnv>();

  app.get('/', (c) => c.json({ status: 'healthy' }));

  // Readiness includes the database
  app.get('/ready', async (c) => {
    try {
      await storage.ping();
      return c.json({ status: 'ready' });
    } catch (err) {
      logger.warn('Readiness check failed', { error: err });
      return c.json({ status: 'unavailable' }, 503);
    }
  });

  return app;
}
