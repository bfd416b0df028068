import { sql } from 'drizzle-orm';
import type { IStorage } from '../interfaces/index.js';
import { initializeDatabase, type Executor } from './client.js';
import { DrizzleUserStorage } from './repositories/user-repository.js';
import { DrizzleRefreshTokenStorage, DrizzleActionTokenStorage } from './repositories/token-repository.js';

export { initializeDatabase, closeDatabase, type Executor } from './client.js';
export { DrizzleUserStorage } from './repositories/user-repository.js';
export { DrizzleRefreshTokenStorage, DrizzleActionTokenStorage } from './repositories/token-repository.js';
export * as schema from './schema.js';

/**
 * PostgreSQL storage over drizzle. A transaction hands `fn` a storage bound
 * to the transaction's connection.
 */
export class DrizzleStorage implements IStorage {
  readonly users: DrizzleUserStorage;
  readonly refreshTokens: DrizzleRefreshTokenStorage;
  readonly actionTokens: DrizzleActionTokenStorage;

  constructor(private readonly db: Executor) {
    this.users = new DrizzleUserStorage(db);
    this.refreshTokens = new DrizzleRefreshTokenStorage(db);
    this.actionTokens = new DrizzleActionTokenStorage(db);
  }

  async transaction<T>(fn: (tx: IStorage) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) => fn(new DrizzleStorage(tx)));
  }

  async ping(): Promise<void> {
    await this.db.execute(sql`select 1`);
  }
}

/**
 * Create a complete PostgreSQL storage implementation
 */
export function createDrizzleStorage(connectionString: string): DrizzleStorage {
  return new DrizzleStorage(initializeDatabase(connectionString));
}
