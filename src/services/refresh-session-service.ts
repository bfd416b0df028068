import type { IStorage } from '../storage/interfaces/index.js';
import type { RefreshToken } from '../types/token.js';
import { type Clock, systemClock } from '../types/clock.js';
import type { Logger } from '../logging/logger.js';
import { ApiError } from '../errors/api-error.js';
import { generateId, generateRefreshToken, hashToken, tokenFingerprint } from '../crypto/index.js';

export interface RefreshSessionMetadata {
  deviceInfo?: string;
  ipAddress?: string;
}

/**
 * A refresh secret as handed to the client. Only its hash is stored.
 */
export interface IssuedRefreshSession {
  secret: string;
  sessionId: string;
  userId: string;
  expiresAt: Date;
}

export interface SessionSummary {
  sessionId: string;
  deviceInfo: string | null;
  ipAddress: string | null;
  createdAt: string;
  expiresAt: string;
}

export interface RefreshSessionServiceOptions {
  storage: IStorage;
  ttlDays: number;
  logger: Logger;
  now?: Clock;
}

/**
 * Issues and rotates opaque refresh tokens
 */
export class RefreshSessionService {
  private readonly storage: IStorage;
  private readonly ttlMs: number;
  private readonly logger: Logger;
  private readonly now: Clock;

  constructor(options: RefreshSessionServiceOptions) {
    this.storage = options.storage;
    this.ttlMs = options.ttlDays * 24 * 60 * 60 * 1000;
    this.logger = options.logger;
    this.now = options.now ?? systemClock;
  }

  get ttlSeconds(): number {
    return Math.floor(this.ttlMs / 1000);
  }

  async issue(userId: string, metadata: RefreshSessionMetadata = {}): Promise<IssuedRefreshSession> {
    const secret = generateRefreshToken();
    const expiresAt = this.expiry();

    const token = await this.storage.refreshTokens.create({
      userId,
      sessionId: generateId(),
      tokenHash: hashToken(secret),
      deviceInfo: metadata.deviceInfo,
      ipAddress: metadata.ipAddress,
      expiresAt,
    });

    return { secret, sessionId: token.sessionId, userId, expiresAt };
  }

  /**
   * Exchange a refresh secret for a new one in the same session.
   * A secret is accepted at most once.
   */
  async rotate(secret: string): Promise<IssuedRefreshSession> {
    const secretNext = generateRefreshToken();
    const expiresAt = this.expiry();

    const result = await this.storage.refreshTokens.rotate(
      hashToken(secret),
      { tokenHash: hashToken(secretNext), expiresAt },
      this.now()
    );

    switch (result.status) {
      case 'not_found':
        this.logger.warn('Refresh token not found; unknown or already rotated', {
          token: tokenFingerprint(secret),
        });
        throw ApiError.authFailure('Invalid refresh token');
      case 'expired':
        this.logger.info('Refresh token expired', {
          sessionId: result.previous.sessionId,
          userId: result.previous.userId,
        });
        throw ApiError.authFailure('Invalid refresh token');
      case 'rotated':
        return {
          secret: secretNext,
          sessionId: result.token.sessionId,
          userId: result.token.userId,
          expiresAt: result.token.expiresAt,
        };
    }
  }

  async revoke(secret: string): Promise<boolean> {
    return this.storage.refreshTokens.deleteByHash(hashToken(secret));
  }

  /**
   * Revoke every session of a user. Pass a transaction's storage to join it.
   */
  async revokeAll(userId: string, storage: IStorage = this.storage): Promise<number> {
    return storage.refreshTokens.deleteByUser(userId);
  }

  async listSessions(userId: string): Promise<SessionSummary[]> {
    const tokens = await this.storage.refreshTokens.listByUser(userId, this.now());
    return tokens.map(toSessionSummary);
  }

  async cleanupExpired(): Promise<number> {
    return this.storage.refreshTokens.deleteExpired(this.now());
  }

  private expiry(): Date {
    return new Date(this.now().getTime() + this.ttlMs);
  }
}

function toSessionSummary(token: RefreshToken): SessionSummary {
  return {
    sessionId: token.sessionId,
    deviceInfo: token.deviceInfo ?? null,
    ipAddress: token.ipAddress ?? null,
    createdAt: token.createdAt.toISOString(),
    expiresAt: token.expiresAt.toISOString(),
  };
}
