import { and, desc, eq, gt, isNotNull, isNull, lte, or } from 'drizzle-orm';
import type {
  RefreshToken,
  CreateRefreshTokenInput,
  RotateRefreshTokenResult,
  ActionToken,
  ActionTokenPurpose,
  CreateActionTokenInput,
} from '../../../types/token.js';
import type { IRefreshTokenStorage, IActionTokenStorage } from '../../interfaces/token-storage.js';
import type { Executor } from '../client.js';
import {
  refreshTokens,
  actionTokens,
  type RefreshTokenRow,
  type ActionTokenRow,
} from '../schema.js';

function rowToRefreshToken(row: RefreshTokenRow): RefreshToken {
  return {
    id: row.id,
    userId: row.userId,
    sessionId: row.sessionId,
    tokenHash: row.tokenHash,
    deviceInfo: row.deviceInfo ?? undefined,
    ipAddress: row.ipAddress ?? undefined,
    expiresAt: row.expiresAt,
    createdAt: row.createdAt,
  };
}

function rowToActionToken(row: ActionTokenRow): ActionToken {
  return {
    id: row.id,
    userId: row.userId,
    purpose: row.purpose,
    tokenHash: row.tokenHash,
    expiresAt: row.expiresAt,
    usedAt: row.usedAt ?? undefined,
    createdAt: row.createdAt,
  };
}

/**
 * Drizzle refresh token storage implementation
 */
export class DrizzleRefreshTokenStorage implements IRefreshTokenStorage {
  constructor(private readonly db: Executor) {}

  async create(input: CreateRefreshTokenInput): Promise<RefreshToken> {
    const [row] = await this.db
      .insert(refreshTokens)
      .values({
        userId: input.userId,
        sessionId: input.sessionId,
        tokenHash: input.tokenHash,
        deviceInfo: input.deviceInfo ?? null,
        ipAddress: input.ipAddress ?? null,
        expiresAt: input.expiresAt,
      })
      .returning();
    if (!row) {
      throw new Error('Refresh token insert returned no row');
    }
    return rowToRefreshToken(row);
  }

  async rotate(
    tokenHash: string,
    replacement: { tokenHash: string; expiresAt: Date },
    now: Date
  ): Promise<RotateRefreshTokenResult> {
    return this.db.transaction(async (tx): Promise<RotateRefreshTokenResult> => {
      // A concurrent rotation blocks here, then finds the row gone
      const [row] = await tx
        .select()
        .from(refreshTokens)
        .where(eq(refreshTokens.tokenHash, tokenHash))
        .for('update');

      if (!row) {
        return { status: 'not_found' };
      }

      const previous = rowToRefreshToken(row);
      await tx.delete(refreshTokens).where(eq(refreshTokens.id, row.id));

      if (previous.expiresAt <= now) {
        return { status: 'expired', previous };
      }

      const [inserted] = await tx
        .insert(refreshTokens)
        .values({
          userId: row.userId,
          sessionId: row.sessionId,
          tokenHash: replacement.tokenHash,
          deviceInfo: row.deviceInfo,
          ipAddress: row.ipAddress,
          expiresAt: replacement.expiresAt,
        })
        .returning();
      if (!inserted) {
        throw new Error('Refresh token insert returned no row');
      }

      return { status: 'rotated', previous, token: rowToRefreshToken(inserted) };
    });
  }

  async deleteByHash(tokenHash: string): Promise<boolean> {
    const deleted = await this.db
      .delete(refreshTokens)
      .where(eq(refreshTokens.tokenHash, tokenHash))
      .returning({ id: refreshTokens.id });
    return deleted.length > 0;
  }

  async deleteByUser(userId: string): Promise<number> {
    const deleted = await this.db
      .delete(refreshTokens)
      .where(eq(refreshTokens.userId, userId))
      .returning({ id: refreshTokens.id });
    return deleted.length;
  }

  async listByUser(userId: string, now: Date): Promise<RefreshToken[]> {
    const rows = await this.db
      .select()
      .from(refreshTokens)
      .where(and(eq(refreshTokens.userId, userId), gt(refreshTokens.expiresAt, now)))
      .orderBy(desc(refreshTokens.createdAt));
    return rows.map(rowToRefreshToken);
  }

  async deleteExpired(now: Date): Promise<number> {
    const deleted = await this.db
      .delete(refreshTokens)
      .where(lte(refreshTokens.expiresAt, now))
      .returning({ id: refreshTokens.id });
    return deleted.length;
  }
}

/**
 * Drizzle action token storage implementation
 */
export class DrizzleActionTokenStorage implements IActionTokenStorage {
  constructor(private readonly db: Executor) {}

  async supersede(userId: string, purpose: ActionTokenPurpose, now: Date): Promise<number> {
    const updated = await this.db
      .update(actionTokens)
      .set({ usedAt: now })
      .where(
        and(eq(actionTokens.userId, userId), eq(actionTokens.purpose, purpose), isNull(actionTokens.usedAt))
      )
      .returning({ id: actionTokens.id });
    return updated.length;
  }

  async create(input: CreateActionTokenInput): Promise<ActionToken> {
    const [row] = await this.db
      .insert(actionTokens)
      .values({
        userId: input.userId,
        purpose: input.purpose,
        tokenHash: input.tokenHash,
        expiresAt: input.expiresAt,
      })
      .returning();
    if (!row) {
      throw new Error('Action token insert returned no row');
    }
    return rowToActionToken(row);
  }

  async consume(tokenHash: string, purpose: ActionTokenPurpose, now: Date): Promise<string | null> {
    const [row] = await this.db
      .update(actionTokens)
      .set({ usedAt: now })
      .where(
        and(
          eq(actionTokens.tokenHash, tokenHash),
          eq(actionTokens.purpose, purpose),
          isNull(actionTokens.usedAt),
          gt(actionTokens.expiresAt, now)
        )
      )
      .returning({ userId: actionTokens.userId });
    return row?.userId ?? null;
  }

  async deleteStale(now: Date): Promise<number> {
    const deleted = await this.db
      .delete(actionTokens)
      .where(or(lte(actionTokens.expiresAt, now), isNotNull(actionTokens.usedAt)))
      .returning({ id: actionTokens.id });
    return deleted.length;
  }
}
