import { and, eq, lt } from 'drizzle-orm';
import type { User, CreateUserInput, UpdateUserInput } from '../../../types/user.js';
import {
  authProviderOf,
  credentialsFromColumns,
  externalIdOf,
  passwordHashOf,
} from '../../../types/user.js';
import type { IUserStorage, CreateUserResult, UpdateUserResult } from '../../interfaces/user-storage.js';
import type { Executor } from '../client.js';
import { users, userStats, type UserRow } from '../schema.js';

const UNIQUE_VIOLATION = '23505';

function rowToUser(row: UserRow): User {
  const credentials = credentialsFromColumns(row.passwordHash, row.externalId);
  if (!credentials) {
    throw new Error(`User ${row.id} has neither a password hash nor an external id`);
  }

  return {
    id: row.id,
    username: row.username,
    email: row.email,
    credentials,
    emailVerified: row.emailVerified,
    profilePictureUrl: row.profilePictureUrl ?? undefined,
    createdAt: row.createdAt,
  };
}

/**
 * Name of the violated unique constraint, or null when `err` is something else.
 * Looks through `cause` for drivers that wrap the pg error.
 */
function uniqueViolation(err: unknown): string | null {
  for (let current: unknown = err; current instanceof Error; current = current.cause) {
    if ('code' in current && current.code === UNIQUE_VIOLATION) {
      return 'constraint' in current && typeof current.constraint === 'string' ? current.constraint : '';
    }
  }
  return null;
}

/**
 * Drizzle user storage implementation
 */
export class DrizzleUserStorage implements IUserStorage {
  constructor(private readonly db: Executor) {}

  async findById(id: string): Promise<User | null> {
    const [row] = await this.db.select().from(users).where(eq(users.id, id));
    return row ? rowToUser(row) : null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const [row] = await this.db.select().from(users).where(eq(users.email, email));
    return row ? rowToUser(row) : null;
  }

  async findByExternalId(externalId: string): Promise<User | null> {
    const [row] = await this.db.select().from(users).where(eq(users.externalId, externalId));
    return row ? rowToUser(row) : null;
  }

  async create(input: CreateUserInput): Promise<CreateUserResult> {
    // DO NOTHING keeps an enclosing transaction usable after a conflict
    const [row] = await this.db
      .insert(users)
      .values({
        username: input.username,
        email: input.email,
        passwordHash: passwordHashOf(input.credentials) ?? null,
        externalId: externalIdOf(input.credentials) ?? null,
        authProvider: authProviderOf(input.credentials),
        emailVerified: input.emailVerified,
        profilePictureUrl: input.profilePictureUrl ?? null,
      })
      .onConflictDoNothing()
      .returning();

    if (!row) {
      const emailTaken = await this.findByEmail(input.email);
      return { status: 'conflict', field: emailTaken ? 'email' : 'username' };
    }

    await this.db.insert(userStats).values({ userId: row.id });

    return { status: 'created', user: rowToUser(row) };
  }

  async update(id: string, input: UpdateUserInput): Promise<UpdateUserResult> {
    const values: Partial<typeof users.$inferInsert> = {};
    if (input.username !== undefined) values.username = input.username;
    if (input.emailVerified !== undefined) values.emailVerified = input.emailVerified;
    if (input.profilePictureUrl !== undefined) values.profilePictureUrl = input.profilePictureUrl;
    if (input.credentials !== undefined) {
      values.passwordHash = passwordHashOf(input.credentials) ?? null;
      values.externalId = externalIdOf(input.credentials) ?? null;
      values.authProvider = authProviderOf(input.credentials);
    }

    if (Object.keys(values).length === 0) {
      const existing = await this.findById(id);
      return existing ? { status: 'updated', user: existing } : { status: 'not_found' };
    }

    try {
      const [row] = await this.db.update(users).set(values).where(eq(users.id, id)).returning();
      return row ? { status: 'updated', user: rowToUser(row) } : { status: 'not_found' };
    } catch (err) {
      if (uniqueViolation(err) === 'users_username_key') {
        return { status: 'conflict', field: 'username' };
      }
      throw err;
    }
  }

  async delete(id: string): Promise<boolean> {
    const deleted = await this.db.delete(users).where(eq(users.id, id)).returning({ id: users.id });
    return deleted.length > 0;
  }

  async deleteUnverifiedCreatedBefore(cutoff: Date): Promise<number> {
    const deleted = await this.db
      .delete(users)
      .where(and(eq(users.emailVerified, false), lt(users.createdAt, cutoff)))
      .returning({ id: users.id });
    return deleted.length;
  }
}
