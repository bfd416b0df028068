import type { IStorage } from '../interfaces/index.js';
import { MemoryUserStorage } from './user-storage.js';
import { MemoryRefreshTokenStorage, MemoryActionTokenStorage } from './token-storage.js';
import { type MemoryState, MemoryJournal, createMemoryState } from './state.js';

export { MemoryUserStorage } from './user-storage.js';
export { MemoryRefreshTokenStorage, MemoryActionTokenStorage } from './token-storage.js';

/**
 * In-memory storage. Transactions run one at a time and, when they fail,
 * undo the writes they made.
 */
export class MemoryStorage implements IStorage {
  readonly users: MemoryUserStorage;
  readonly refreshTokens: MemoryRefreshTokenStorage;
  readonly actionTokens: MemoryActionTokenStorage;

  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly state: MemoryState = createMemoryState(),
    private readonly journal?: MemoryJournal
  ) {
    this.users = new MemoryUserStorage(state, journal);
    this.refreshTokens = new MemoryRefreshTokenStorage(state, journal);
    this.actionTokens = new MemoryActionTokenStorage(state, journal);
  }

  async transaction<T>(fn: (tx: IStorage) => Promise<T>): Promise<T> {
    if (this.journal) {
      return fn(this);
    }

    const run = async (): Promise<T> => {
      const journal = new MemoryJournal();
      try {
        return await fn(new MemoryStorage(this.state, journal));
      } catch (err) {
        journal.rollback();
        throw err;
      }
    };

    const result = this.queue.then(run);
    this.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  async ping(): Promise<void> {
    // Always reachable
  }
}

/**
 * Create a complete in-memory storage implementation
 */
export function createMemoryStorage(): MemoryStorage {
  return new MemoryStorage();
}
