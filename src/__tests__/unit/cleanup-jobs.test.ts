import { describe, it, expect, vi, afterEach } from 'vitest';
import { cleanupUnverifiedAccounts, startCleanupJobs } from '../../services/cleanup-jobs.js';
import { RefreshSessionService } from '../../services/refresh-session-service.js';
import { ActionTokenService } from '../../services/action-token-service.js';
import { createMemoryStorage } from '../../storage/memory/index.js';
import { createLogger } from '../../logging/logger.js';
import { TestClock } from '../e2e/test-setup.js';

const DAY_MS = 24 * 60 * 60 * 1000;

function setup() {
  const storage = createMemoryStorage();
  const clock = new TestClock();
  const logger = createLogger('silent');
  const refreshSessions = new RefreshSessionService({ storage, ttlDays: 30, logger, now: clock.now });
  const actionTokens = new ActionTokenService({
    storage,
    ttlHours: { email_verification: 24, password_reset: 1 },
    now: clock.now,
  });
  return { storage, clock, logger, refreshSessions, actionTokens };
}

async function createUser(
  storage: ReturnType<typeof createMemoryStorage>,
  username: string,
  emailVerified: boolean
): Promise<string> {
  const created = await storage.users.create({
    username,
    email: `${username}@example.com`,
    credentials: { kind: 'password', passwordHash: 'unused' },
    emailVerified,
  });
  if (created.status !== 'created') throw new Error('setup failed');
  return created.user.id;
}

describe('cleanupUnverifiedAccounts', () => {
  it('should delete only unverified accounts older than seven days', async () => {
    const { storage, clock, logger } = setup();
    const stale = await createUser(storage, 'stale', false);
    const recent = await createUser(storage, 'recent', false);
    const verified = await createUser(storage, 'verified', true);

    const old = new Date(clock.now().getTime() - 8 * DAY_MS);
    storage.users.setCreatedAt(stale, old);
    storage.users.setCreatedAt(verified, old);
    storage.users.setCreatedAt(recent, new Date(clock.now().getTime() - 6 * DAY_MS));

    expect(await cleanupUnverifiedAccounts({ storage, logger, now: clock.now })).toBe(1);
    expect(await storage.users.findById(stale)).toBeNull();
    expect(await storage.users.findById(recent)).not.toBeNull();
    expect(await storage.users.findById(verified)).not.toBeNull();
  });
});

describe('startCleanupJobs', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should run each job at its offset and then on its interval', async () => {
    vi.useFakeTimers();
    const deps = setup();
    const cleanupExpired = vi.spyOn(deps.refreshSessions, 'cleanupExpired');
    const deleteUnverified = vi.spyOn(deps.storage.users, 'deleteUnverifiedCreatedBefore');
    const sweepRateLimiter = vi.fn();

    const jobs = startCleanupJobs({ ...deps, now: deps.clock.now, sweepRateLimiter });

    await vi.advanceTimersByTimeAsync(60 * 1000);
    expect(sweepRateLimiter).toHaveBeenCalledTimes(1);
    expect(cleanupExpired).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(60 * 60 * 1000);
    expect(cleanupExpired).toHaveBeenCalledTimes(1);
    expect(deleteUnverified).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(60 * 60 * 1000);
    expect(deleteUnverified).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(6 * 60 * 60 * 1000);
    expect(cleanupExpired).toHaveBeenCalledTimes(2);

    jobs.stop();
    const sweeps = sweepRateLimiter.mock.calls.length;
    await vi.advanceTimersByTimeAsync(DAY_MS);
    expect(sweepRateLimiter).toHaveBeenCalledTimes(sweeps);
    expect(cleanupExpired).toHaveBeenCalledTimes(2);
  });
});
