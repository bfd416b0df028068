import type { MiddlewareHandler } from 'hono';
import { setTimeout as delay } from 'node:timers/promises';
import type { AppEnv } from '../types/hono.js';

export type Sleep = (ms: number) => Promise<unknown>;

/**
 * Hold the response until at least `floorMs` has passed since the request
 * reached this middleware, whether the handler succeeded or failed.
 */
export function timingFloor(floorMs: number, sleep: Sleep = delay): MiddlewareHandler<AppEnv> {
  return async (_c, next) => {
    const start = performance.now();
    try {
      await next();
    } finally {
      const remaining = floorMs - (performance.now() - start);
      if (remaining > 0) {
        await sleep(remaining);
      }
    }
  };
}
