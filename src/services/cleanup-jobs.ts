import type { IStorage } from '../storage/interfaces/index.js';
import type { Logger } from '../logging/logger.js';
import { type Clock, systemClock } from '../types/clock.js';
import type { RefreshSessionService } from './refresh-session-service.js';
import type { ActionTokenService } from './action-token-service.js';
import {
  TOKEN_CLEANUP_OFFSET_MS,
  TOKEN_CLEANUP_INTERVAL_MS,
  UNVERIFIED_CLEANUP_OFFSET_MS,
  UNVERIFIED_CLEANUP_INTERVAL_MS,
  UNVERIFIED_ACCOUNT_MAX_AGE_DAYS,
  RATE_LIMIT_SWEEP_INTERVAL_MS,
} from '../config/constants.js';

export interface CleanupJobsOptions {
  storage: IStorage;
  refreshSessions: RefreshSessionService;
  actionTokens: ActionTokenService;
  logger: Logger;
  /** Called on every rate limiter sweep tick */
  sweepRateLimiter?: () => void;
  now?: Clock;
}

export interface CleanupJobs {
  stop(): void;
}

/**
 * Delete expired refresh tokens and stale action tokens
 */
export async function cleanupTokens(
  options: Pick<CleanupJobsOptions, 'refreshSessions' | 'actionTokens' | 'logger'>
): Promise<{ refreshTokens: number; actionTokens: number }> {
  const refreshTokens = await options.refreshSessions.cleanupExpired();
  const actionTokens = await options.actionTokens.cleanup();
  options.logger.info('Token cleanup finished', { refreshTokens, actionTokens });
  return { refreshTokens, actionTokens };
}

/**
 * Delete accounts that never verified their email
 */
export async function cleanupUnverifiedAccounts(
  options: Pick<CleanupJobsOptions, 'storage' | 'logger' | 'now'>
): Promise<number> {
  const now = (options.now ?? systemClock)();
  const cutoff = new Date(now.getTime() - UNVERIFIED_ACCOUNT_MAX_AGE_DAYS * 24 * 60 * 60 * 1000);
  const deleted = await options.storage.users.deleteUnverifiedCreatedBefore(cutoff);
  options.logger.info('Unverified account cleanup finished', { deleted });
  return deleted;
}

/**
 * Schedule the periodic cleanup jobs. Timers do not keep the process alive.
 */
export function startCleanupJobs(options: CleanupJobsOptions): CleanupJobs {
  const { logger } = options;
  const timers: NodeJS.Timeout[] = [];

  const schedule = (name: string, offsetMs: number, intervalMs: number, job: () => Promise<unknown>) => {
    const run = () => {
      job().catch((err: unknown) => logger.error('Cleanup job failed', { job: name, error: err }));
    };
    const start = setTimeout(() => {
      run();
      const interval = setInterval(run, intervalMs);
      interval.unref();
      timers.push(interval);
    }, offsetMs);
    start.unref();
    timers.push(start);
  };

  schedule('tokens', TOKEN_CLEANUP_OFFSET_MS, TOKEN_CLEANUP_INTERVAL_MS, () => cleanupTokens(options));
  schedule('unverified_accounts', UNVERIFIED_CLEANUP_OFFSET_MS, UNVERIFIED_CLEANUP_INTERVAL_MS, () =>
    cleanupUnverifiedAccounts(options)
  );

  const { sweepRateLimiter } = options;
  if (sweepRateLimiter) {
    const sweep = setInterval(sweepRateLimiter, RATE_LIMIT_SWEEP_INTERVAL_MS);
    sweep.unref();
    timers.push(sweep);
  }

  logger.info('Cleanup jobs scheduled');

  return {
    stop() {
      for (const timer of timers) {
        clearTimeout(timer);
      }
      timers.length = 0;
    },
  };
}
