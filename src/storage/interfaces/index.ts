export * from './token-storage.js';
export * from './user-storage.js';

import type { IRefreshTokenStorage, IActionTokenStorage } from './token-storage.js';
import type { IUserStorage } from './user-storage.js';

/**
 * Complete storage interface for the session service
 */
export interface IStorage {
  users: IUserStorage;
  refreshTokens: IRefreshTokenStorage;
  actionTokens: IActionTokenStorage;

  /**
   * Run `fn` in a transaction. `fn` must use the storage it receives.
   * Commits when `fn` resolves, rolls back when it rejects.
   */
  transaction<T>(fn: (tx: IStorage) => Promise<T>): Promise<T>;

  /**
   * Check connectivity (readiness probe)
   */
  ping(): Promise<void>;
}
