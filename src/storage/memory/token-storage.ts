import type {
  RefreshToken,
  CreateRefreshTokenInput,
  RotateRefreshTokenResult,
  ActionToken,
  ActionTokenPurpose,
  CreateActionTokenInput,
} from '../../types/token.js';
import type { IRefreshTokenStorage, IActionTokenStorage } from '../interfaces/token-storage.js';
import { generateId } from '../../crypto/index.js';
import { type MemoryState, type MemoryJournal, putRow, deleteRow } from './state.js';

/**
 * In-memory refresh token storage implementation.
 * Every method body runs without awaiting, so each call is atomic.
 */
export class MemoryRefreshTokenStorage implements IRefreshTokenStorage {
  constructor(
    private readonly state: MemoryState,
    private readonly journal?: MemoryJournal
  ) {}

  async create(input: CreateRefreshTokenInput): Promise<RefreshToken> {
    return this.insert(input);
  }

  async rotate(
    tokenHash: string,
    replacement: { tokenHash: string; expiresAt: Date },
    now: Date
  ): Promise<RotateRefreshTokenResult> {
    const previous = this.lookup(tokenHash);
    if (!previous) {
      return { status: 'not_found' };
    }

    deleteRow(this.state.refreshTokens, previous.id, this.journal);

    if (previous.expiresAt <= now) {
      return { status: 'expired', previous };
    }

    const token = this.insert({
      userId: previous.userId,
      sessionId: previous.sessionId,
      deviceInfo: previous.deviceInfo,
      ipAddress: previous.ipAddress,
      tokenHash: replacement.tokenHash,
      expiresAt: replacement.expiresAt,
    });

    return { status: 'rotated', previous, token };
  }

  async deleteByHash(tokenHash: string): Promise<boolean> {
    const token = this.lookup(tokenHash);
    return token ? deleteRow(this.state.refreshTokens, token.id, this.journal) : false;
  }

  async deleteByUser(userId: string): Promise<number> {
    return this.deleteWhere((t) => t.userId === userId);
  }

  async listByUser(userId: string, now: Date): Promise<RefreshToken[]> {
    return [...this.state.refreshTokens.values()]
      .filter((t) => t.userId === userId && t.expiresAt > now)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  async deleteExpired(now: Date): Promise<number> {
    return this.deleteWhere((t) => t.expiresAt <= now);
  }

  private insert(input: CreateRefreshTokenInput): RefreshToken {
    if (this.lookup(input.tokenHash)) {
      throw new Error('Duplicate refresh token hash');
    }

    const token: RefreshToken = {
      id: generateId(),
      userId: input.userId,
      sessionId: input.sessionId,
      tokenHash: input.tokenHash,
      deviceInfo: input.deviceInfo,
      ipAddress: input.ipAddress,
      expiresAt: input.expiresAt,
      createdAt: new Date(),
    };
    putRow(this.state.refreshTokens, token.id, token, this.journal);
    return token;
  }

  private lookup(tokenHash: string): RefreshToken | null {
    for (const token of this.state.refreshTokens.values()) {
      if (token.tokenHash === tokenHash) return token;
    }
    return null;
  }

  private deleteWhere(predicate: (token: RefreshToken) => boolean): number {
    let count = 0;
    for (const [id, token] of this.state.refreshTokens) {
      if (predicate(token)) {
        deleteRow(this.state.refreshTokens, id, this.journal);
        count++;
      }
    }
    return count;
  }
}

/**
 * In-memory action token storage implementation
 */
export class MemoryActionTokenStorage implements IActionTokenStorage {
  constructor(
    private readonly state: MemoryState,
    private readonly journal?: MemoryJournal
  ) {}

  async supersede(userId: string, purpose: ActionTokenPurpose, now: Date): Promise<number> {
    let count = 0;
    for (const [id, token] of this.state.actionTokens) {
      if (token.userId === userId && token.purpose === purpose && !token.usedAt) {
        putRow(this.state.actionTokens, id, { ...token, usedAt: now }, this.journal);
        count++;
      }
    }
    return count;
  }

  async create(input: CreateActionTokenInput): Promise<ActionToken> {
    const token: ActionToken = {
      id: generateId(),
      userId: input.userId,
      purpose: input.purpose,
      tokenHash: input.tokenHash,
      expiresAt: input.expiresAt,
      createdAt: new Date(),
    };
    putRow(this.state.actionTokens, token.id, token, this.journal);
    return token;
  }

  async consume(tokenHash: string, purpose: ActionTokenPurpose, now: Date): Promise<string | null> {
    for (const [id, token] of this.state.actionTokens) {
      if (
        token.tokenHash === tokenHash &&
        token.purpose === purpose &&
        !token.usedAt &&
        token.expiresAt > now
      ) {
        putRow(this.state.actionTokens, id, { ...token, usedAt: now }, this.journal);
        return token.userId;
      }
    }
    return null;
  }

  async deleteStale(now: Date): Promise<number> {
    let count = 0;
    for (const [id, token] of this.state.actionTokens) {
      if (token.usedAt || token.expiresAt <= now) {
        deleteRow(this.state.actionTokens, id, this.journal);
        count++;
      }
    }
    return count;
  }
}
