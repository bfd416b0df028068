import { describe, it, expect, beforeEach } from 'vitest';
import { IdentityService, deriveUsernameBase, usernameCandidate } from '../../services/identity-service.js';
import { createMemoryStorage, type MemoryStorage } from '../../storage/memory/index.js';
import { createLogger } from '../../logging/logger.js';

describe('deriveUsernameBase', () => {
  it('should use the display name with invalid characters replaced', () => {
    expect(deriveUsernameBase('Grace Hopper', 'grace@example.com')).toBe('Grace_Hopper');
    expect(deriveUsernameBase('José.Ñ', 'j@example.com')).toBe('Jos___');
  });

  it('should fall back to the email local part', () => {
    expect(deriveUsernameBase(undefined, 'lin.chen@example.com')).toBe('lin_chen');
    expect(deriveUsernameBase('   ', 'lin@example.com')).toBe('lin');
  });

  it('should use the fallback when the result is too short', () => {
    expect(deriveUsernameBase('Al', 'al@example.com')).toBe('user');
  });

  it('should truncate to the maximum length', () => {
    expect(deriveUsernameBase('a'.repeat(40), 'x@example.com')).toBe('a'.repeat(30));
  });
});

describe('usernameCandidate', () => {
  it('should append a counter that fits the maximum length', () => {
    expect(usernameCandidate('grace', 1)).toBe('grace');
    expect(usernameCandidate('grace', 2)).toBe('grace2');
    expect(usernameCandidate('b'.repeat(30), 12)).toBe(`${'b'.repeat(28)}12`);
  });
});

describe('IdentityService', () => {
  let storage: MemoryStorage;
  let identities: IdentityService;

  beforeEach(() => {
    storage = createMemoryStorage();
    identities = new IdentityService({ storage, logger: createLogger('silent') });
  });

  const profile = {
    externalId: 'idp-42',
    email: 'lin@example.com',
    name: 'Lin',
    picture: 'https://img.test/lin.png',
  };

  it('should create a verified federated account', async () => {
    const user = await identities.resolveFederatedUser(profile);

    expect(user.username).toBe('Lin');
    expect(user.emailVerified).toBe(true);
    expect(user.credentials).toEqual({ kind: 'federated', externalId: 'idp-42' });
    expect(user.profilePictureUrl).toBe('https://img.test/lin.png');
  });

  it('should return the linked account on later logins', async () => {
    const first = await identities.resolveFederatedUser(profile);
    const second = await identities.resolveFederatedUser({ ...profile, email: 'changed@example.com' });

    expect(second.id).toBe(first.id);
  });

  it('should update the picture when it changes', async () => {
    await identities.resolveFederatedUser(profile);
    const user = await identities.resolveFederatedUser({ ...profile, picture: 'https://img.test/lin-2.png' });

    expect(user.profilePictureUrl).toBe('https://img.test/lin-2.png');
  });

  it('should link an unverified password account and verify it', async () => {
    const created = await storage.users.create({
      username: 'lin',
      email: 'lin@example.com',
      credentials: { kind: 'password', passwordHash: 'stored-hash' },
      emailVerified: false,
    });
    if (created.status !== 'created') throw new Error('setup failed');

    const user = await identities.resolveFederatedUser(profile);

    expect(user.id).toBe(created.user.id);
    expect(user.emailVerified).toBe(true);
    expect(user.credentials).toEqual({ kind: 'linked', passwordHash: 'stored-hash', externalId: 'idp-42' });
  });

  it('should count past taken usernames', async () => {
    for (const [username, email] of [
      ['Lin', 'a@example.com'],
      ['Lin2', 'b@example.com'],
    ] as const) {
      await storage.users.create({
        username,
        email,
        credentials: { kind: 'password', passwordHash: 'unused' },
        emailVerified: true,
      });
    }

    const user = await identities.resolveFederatedUser(profile);

    expect(user.username).toBe('Lin3');
  });
});
