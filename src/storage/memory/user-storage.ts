import type { User, CreateUserInput, UpdateUserInput } from '../../types/user.js';
import { externalIdOf } from '../../types/user.js';
import type { IUserStorage, CreateUserResult, UpdateUserResult } from '../interfaces/user-storage.js';
import { generateId } from '../../crypto/index.js';
import { type MemoryState, type MemoryJournal, putRow, deleteRow, addMember, deleteMember } from './state.js';

/**
 * In-memory user storage implementation
 */
export class MemoryUserStorage implements IUserStorage {
  constructor(
    private readonly state: MemoryState,
    private readonly journal?: MemoryJournal
  ) {}

  async findById(id: string): Promise<User | null> {
    return this.state.users.get(id) ?? null;
  }

  async findByEmail(email: string): Promise<User | null> {
    return this.find((u) => u.email === email);
  }

  async findByExternalId(externalId: string): Promise<User | null> {
    return this.find((u) => externalIdOf(u.credentials) === externalId);
  }

  async create(input: CreateUserInput): Promise<CreateUserResult> {
    if (this.find((u) => u.email === input.email)) {
      return { status: 'conflict', field: 'email' };
    }
    if (this.find((u) => u.username === input.username)) {
      return { status: 'conflict', field: 'username' };
    }

    const user: User = {
      id: generateId(),
      username: input.username,
      email: input.email,
      credentials: input.credentials,
      emailVerified: input.emailVerified,
      profilePictureUrl: input.profilePictureUrl,
      createdAt: new Date(),
    };

    putRow(this.state.users, user.id, user, this.journal);
    addMember(this.state.userStats, user.id, this.journal);

    return { status: 'created', user };
  }

  async update(id: string, input: UpdateUserInput): Promise<UpdateUserResult> {
    const existing = this.state.users.get(id);
    if (!existing) {
      return { status: 'not_found' };
    }

    const { username } = input;
    if (username !== undefined && this.find((u) => u.username === username && u.id !== id)) {
      return { status: 'conflict', field: 'username' };
    }

    const user: User = {
      ...existing,
      username: input.username ?? existing.username,
      credentials: input.credentials ?? existing.credentials,
      emailVerified: input.emailVerified ?? existing.emailVerified,
      profilePictureUrl: input.profilePictureUrl ?? existing.profilePictureUrl,
    };
    putRow(this.state.users, id, user, this.journal);

    return { status: 'updated', user };
  }

  async delete(id: string): Promise<boolean> {
    if (!deleteRow(this.state.users, id, this.journal)) {
      return false;
    }

    deleteMember(this.state.userStats, id, this.journal);
    for (const [tokenId, token] of this.state.refreshTokens) {
      if (token.userId === id) deleteRow(this.state.refreshTokens, tokenId, this.journal);
    }
    for (const [tokenId, token] of this.state.actionTokens) {
      if (token.userId === id) deleteRow(this.state.actionTokens, tokenId, this.journal);
    }
    return true;
  }

  async deleteUnverifiedCreatedBefore(cutoff: Date): Promise<number> {
    const stale = [...this.state.users.values()].filter(
      (u) => !u.emailVerified && u.createdAt < cutoff
    );
    for (const user of stale) {
      await this.delete(user.id);
    }
    return stale.length;
  }

  /**
   * Whether the companion stats row exists (tests)
   */
  hasStats(userId: string): boolean {
    return this.state.userStats.has(userId);
  }

  /**
   * Override a user's creation time (tests)
   */
  setCreatedAt(userId: string, createdAt: Date): void {
    const user = this.state.users.get(userId);
    if (user) {
      this.state.users.set(userId, { ...user, createdAt });
    }
  }

  private find(predicate: (user: User) => boolean): User | null {
    for (const user of this.state.users.values()) {
      if (predicate(user)) return user;
    }
    return null;
  }
}
