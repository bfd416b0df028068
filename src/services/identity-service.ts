import type { IStorage } from '../storage/interfaces/index.js';
import type { User } from '../types/user.js';
import { externalIdOf, linkExternalId } from '../types/user.js';
import type { Logger } from '../logging/logger.js';
import { ApiError } from '../errors/api-error.js';
import { USERNAME_FALLBACK, USERNAME_MAX_LENGTH, USERNAME_MIN_LENGTH } from '../config/constants.js';

/**
 * Verified identity as asserted by the identity provider
 */
export interface FederatedProfile {
  externalId: string;
  email: string;
  name?: string;
  picture?: string;
}

export interface IdentityServiceOptions {
  storage: IStorage;
  logger: Logger;
}

/**
 * Username candidate from a display name or the email's local part
 */
export function deriveUsernameBase(name: string | undefined, email: string): string {
  const source = name?.trim() || email.split('@')[0] || '';
  const base = source.replace(/[^A-Za-z0-9_-]/g, '_').slice(0, USERNAME_MAX_LENGTH);
  return base.length >= USERNAME_MIN_LENGTH ? base : USERNAME_FALLBACK;
}

/**
 * `base` for the first attempt, then `base2`, `base3`, ... trimmed to fit
 */
export function usernameCandidate(base: string, attempt: number): string {
  if (attempt <= 1) {
    return base;
  }
  const suffix = String(attempt);
  return `${base.slice(0, USERNAME_MAX_LENGTH - suffix.length)}${suffix}`;
}

/**
 * Maps a provider identity onto a local user: existing link, then email, then a new account
 */
export class IdentityService {
  private readonly storage: IStorage;
  private readonly logger: Logger;

  constructor(options: IdentityServiceOptions) {
    this.storage = options.storage;
    this.logger = options.logger;
  }

  async resolveFederatedUser(profile: FederatedProfile): Promise<User> {
    const linked = await this.storage.users.findByExternalId(profile.externalId);
    if (linked) {
      return this.refreshPicture(linked, profile.picture);
    }

    const byEmail = await this.storage.users.findByEmail(profile.email);
    if (byEmail) {
      if (!externalIdOf(byEmail.credentials)) {
        return this.link(byEmail, profile);
      }
      // Email already bound to a different external identity
      return this.refreshPicture(byEmail, profile.picture);
    }

    return this.createFederatedUser(profile);
  }

  private async link(user: User, profile: FederatedProfile): Promise<User> {
    const result = await this.storage.users.update(user.id, {
      credentials: linkExternalId(user.credentials, profile.externalId),
      emailVerified: true,
      profilePictureUrl: profile.picture,
    });
    if (result.status !== 'updated') {
      throw ApiError.internal('Failed to link federated identity');
    }

    this.logger.info('Linked federated identity to existing account', { userId: user.id });
    return result.user;
  }

  private async refreshPicture(user: User, picture: string | undefined): Promise<User> {
    if (!picture || picture === user.profilePictureUrl) {
      return user;
    }

    const result = await this.storage.users.update(user.id, { profilePictureUrl: picture });
    return result.status === 'updated' ? result.user : user;
  }

  private async createFederatedUser(profile: FederatedProfile): Promise<User> {
    const base = deriveUsernameBase(profile.name, profile.email);

    for (let attempt = 1; ; attempt++) {
      const username = usernameCandidate(base, attempt);
      const result = await this.storage.transaction((tx) =>
        tx.users.create({
          username,
          email: profile.email,
          credentials: { kind: 'federated', externalId: profile.externalId },
          emailVerified: true,
          profilePictureUrl: profile.picture,
        })
      );

      if (result.status === 'created') {
        this.logger.info('Created account from federated identity', { userId: result.user.id });
        return result.user;
      }
      if (result.field === 'email') {
        // Lost a race with a concurrent signup for the same email
        throw ApiError.conflict('An account with this email already exists');
      }
    }
  }
}
