import type { User, CreateUserInput, UpdateUserInput } from '../../types/user.js';

/**
 * Outcome of inserting a user. Unique violations are reported, not thrown.
 */
export type CreateUserResult =
  | { status: 'created'; user: User }
  | { status: 'conflict'; field: 'email' | 'username' };

export type UpdateUserResult =
  | { status: 'updated'; user: User }
  | { status: 'not_found' }
  | { status: 'conflict'; field: 'username' };

/**
 * Storage interface for users and their companion stats row
 */
export interface IUserStorage {
  findById(id: string): Promise<User | null>;

  /**
   * Find a user by normalized (lower-cased) email
   */
  findByEmail(email: string): Promise<User | null>;

  /**
   * Find a user by the identity provider's subject
   */
  findByExternalId(externalId: string): Promise<User | null>;

  /**
   * Insert a user together with its stats row.
   * Call inside `IStorage.transaction` so both rows commit together.
   */
  create(input: CreateUserInput): Promise<CreateUserResult>;

  update(id: string, input: UpdateUserInput): Promise<UpdateUserResult>;

  /**
   * Delete a user; stats and tokens go with it
   */
  delete(id: string): Promise<boolean>;

  /**
   * Delete unverified users created before `cutoff`
   */
  deleteUnverifiedCreatedBefore(cutoff: Date): Promise<number>;
}
