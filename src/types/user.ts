/**
 * How a user can authenticate. A linked account accepts both.
 */
export type UserCredentials =
  | { kind: 'password'; passwordHash: string }
  | { kind: 'federated'; externalId: string }
  | { kind: 'linked'; passwordHash: string; externalId: string };

/**
 * Persisted authentication provider tag
 */
export type AuthProvider = 'password' | 'federated';

/**
 * User entity
 */
export interface User {
  id: string;
  username: string;
  email: string;
  credentials: UserCredentials;
  emailVerified: boolean;
  profilePictureUrl?: string;
  createdAt: Date;
}

/**
 * Input for creating a user
 */
export interface CreateUserInput {
  username: string;
  email: string;
  credentials: UserCredentials;
  emailVerified: boolean;
  profilePictureUrl?: string;
}

/**
 * Fields of a user that may be changed after creation
 */
export interface UpdateUserInput {
  username?: string;
  credentials?: UserCredentials;
  emailVerified?: boolean;
  profilePictureUrl?: string;
}

/**
 * Public view of a user, as returned by the API
 */
export interface UserProfile {
  id: string;
  username: string;
  email: string;
  email_verified: boolean;
  auth_provider: AuthProvider;
  profile_picture_url: string | null;
  created_at: string;
}

export function authProviderOf(credentials: UserCredentials): AuthProvider {
  return credentials.kind === 'password' ? 'password' : 'federated';
}

export function passwordHashOf(credentials: UserCredentials): string | undefined {
  return credentials.kind === 'federated' ? undefined : credentials.passwordHash;
}

export function externalIdOf(credentials: UserCredentials): string | undefined {
  return credentials.kind === 'password' ? undefined : credentials.externalId;
}

/**
 * Rebuild credentials from stored columns.
 * Returns null for a row with neither a password hash nor an external id.
 */
export function credentialsFromColumns(
  passwordHash: string | null | undefined,
  externalId: string | null | undefined
): UserCredentials | null {
  if (passwordHash && externalId) {
    return { kind: 'linked', passwordHash, externalId };
  }
  if (passwordHash) {
    return { kind: 'password', passwordHash };
  }
  if (externalId) {
    return { kind: 'federated', externalId };
  }
  return null;
}

/**
 * Attach an external identity to existing credentials
 */
export function linkExternalId(credentials: UserCredentials, externalId: string): UserCredentials {
  const passwordHash = passwordHashOf(credentials);
  return passwordHash ? { kind: 'linked', passwordHash, externalId } : { kind: 'federated', externalId };
}

/**
 * Replace the password hash, keeping any external identity
 */
export function withPasswordHash(credentials: UserCredentials, passwordHash: string): UserCredentials {
  const externalId = externalIdOf(credentials);
  return externalId ? { kind: 'linked', passwordHash, externalId } : { kind: 'password', passwordHash };
}

export function toUserProfile(user: User): UserProfile {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    email_verified: user.emailVerified,
    auth_provider: authProviderOf(user.credentials),
    profile_picture_url: user.profilePictureUrl ?? null,
    created_at: user.createdAt.toISOString(),
  };
}
