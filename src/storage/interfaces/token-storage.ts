import type {
  RefreshToken,
  CreateRefreshTokenInput,
  RotateRefreshTokenResult,
  ActionToken,
  ActionTokenPurpose,
  CreateActionTokenInput,
} from '../../types/token.js';

/**
 * Storage interface for refresh token management
 */
export interface IRefreshTokenStorage {
  create(input: CreateRefreshTokenInput): Promise<RefreshToken>;

  /**
   * Atomically replace the row matching `tokenHash` with a row for `replacementHash`.
   *
   * The old row is locked for the duration. An expired row is deleted and the
   * deletion committed before `expired` is returned. Of two concurrent calls
   * with the same hash, exactly one sees `rotated`.
   */
  rotate(
    tokenHash: string,
    replacement: { tokenHash: string; expiresAt: Date },
    now: Date
  ): Promise<RotateRefreshTokenResult>;

  /**
   * Delete a token by hash
   */
  deleteByHash(tokenHash: string): Promise<boolean>;

  /**
   * Delete every token of a user
   */
  deleteByUser(userId: string): Promise<number>;

  /**
   * Active (unexpired) tokens of a user, newest first
   */
  listByUser(userId: string, now: Date): Promise<RefreshToken[]>;

  /**
   * Delete expired tokens (cleanup)
   */
  deleteExpired(now: Date): Promise<number>;
}

/**
 * Storage interface for single-use action tokens
 */
export interface IActionTokenStorage {
  /**
   * Mark every unused token of this user and purpose as used
   */
  supersede(userId: string, purpose: ActionTokenPurpose, now: Date): Promise<number>;

  create(input: CreateActionTokenInput): Promise<ActionToken>;

  /**
   * Mark the token used if it matches, is unused and unexpired.
   * One conditional update; returns the owner's id or null.
   */
  consume(tokenHash: string, purpose: ActionTokenPurpose, now: Date): Promise<string | null>;

  /**
   * Delete tokens that are expired or used (cleanup)
   */
  deleteStale(now: Date): Promise<number>;
}
