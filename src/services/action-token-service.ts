import type { IStorage } from '../storage/interfaces/index.js';
import type { ActionTokenPurpose } from '../types/token.js';
import { type Clock, systemClock } from '../types/clock.js';
import { generateActionToken, hashToken } from '../crypto/index.js';

export interface ActionTokenServiceOptions {
  storage: IStorage;
  ttlHours: Record<ActionTokenPurpose, number>;
  now?: Clock;
}

/**
 * Single-use tokens for email verification and password reset
 */
export class ActionTokenService {
  private readonly storage: IStorage;
  private readonly ttlHours: Record<ActionTokenPurpose, number>;
  private readonly now: Clock;

  constructor(options: ActionTokenServiceOptions) {
    this.storage = options.storage;
    this.ttlHours = options.ttlHours;
    this.now = options.now ?? systemClock;
  }

  /**
   * Issue a token, superseding the user's unused tokens of the same purpose.
   * Returns the secret to mail; only its hash is stored.
   */
  async issue(userId: string, purpose: ActionTokenPurpose, storage: IStorage = this.storage): Promise<string> {
    const secret = generateActionToken();
    const now = this.now();
    const expiresAt = new Date(now.getTime() + this.ttlHours[purpose] * 60 * 60 * 1000);

    await storage.transaction(async (tx) => {
      await tx.actionTokens.supersede(userId, purpose, now);
      await tx.actionTokens.create({ userId, purpose, tokenHash: hashToken(secret), expiresAt });
    });

    return secret;
  }

  /**
   * Mark a token used. Returns its owner, or null when the token is unknown,
   * of another purpose, expired or already used.
   */
  async consume(
    secret: string,
    purpose: ActionTokenPurpose,
    storage: IStorage = this.storage
  ): Promise<string | null> {
    return storage.actionTokens.consume(hashToken(secret), purpose, this.now());
  }

  async cleanup(): Promise<number> {
    return this.storage.actionTokens.deleteStale(this.now());
  }
}
