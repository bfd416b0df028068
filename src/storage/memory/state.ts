import type { User } from '../../types/user.js';
import type { RefreshToken, ActionToken } from '../../types/token.js';

/**
 * Tables of the in-memory store, shared by every repository
 */
export interface MemoryState {
  users: Map<string, User>;
  userStats: Set<string>;
  refreshTokens: Map<string, RefreshToken>;
  actionTokens: Map<string, ActionToken>;
}

export function createMemoryState(): MemoryState {
  return {
    users: new Map(),
    userStats: new Set(),
    refreshTokens: new Map(),
    actionTokens: new Map(),
  };
}

/**
 * Undo log of one transaction. Rolling back reverts only the entries this
 * transaction wrote, and leaves an entry alone when someone else has written
 * it since.
 */
export class MemoryJournal {
  private readonly undo: Array<() => void> = [];

  record(step: () => void): void {
    this.undo.push(step);
  }

  rollback(): void {
    for (const step of this.undo.reverse()) {
      step();
    }
    this.undo.length = 0;
  }
}

/**
 * Write a row, recording how to take it back
 */
export function putRow<V>(table: Map<string, V>, key: string, value: V, journal?: MemoryJournal): void {
  const previous = table.get(key);
  table.set(key, value);
  journal?.record(() => {
    if (table.get(key) !== value) return;
    if (previous === undefined) {
      table.delete(key);
    } else {
      table.set(key, previous);
    }
  });
}

export function deleteRow<V>(table: Map<string, V>, key: string, journal?: MemoryJournal): boolean {
  const previous = table.get(key);
  if (previous === undefined) {
    return false;
  }
  table.delete(key);
  journal?.record(() => {
    if (!table.has(key)) table.set(key, previous);
  });
  return true;
}

export function addMember(set: Set<string>, key: string, journal?: MemoryJournal): void {
  if (set.has(key)) return;
  set.add(key);
  journal?.record(() => set.delete(key));
}

export function deleteMember(set: Set<string>, key: string, journal?: MemoryJournal): void {
  if (!set.delete(key)) return;
  journal?.record(() => set.add(key));
}
