import { z } from 'zod';
import type { AccessTokenClaims } from '../types/token.js';
import { type Clock, systemClock } from '../types/clock.js';
import { ApiError } from '../errors/api-error.js';
import { createHmacKey, signHmacJwt, verifyHmacJwt } from '../crypto/jwt.js';

const claimsSchema = z.object({
  sub: z.string().min(1),
  email: z.string(),
  iat: z.number().int(),
  exp: z.number().int(),
});

export interface AccessTokenServiceOptions {
  secret: string;
  ttlHours: number;
  now?: Clock;
}

/**
 * Mints and verifies short-lived HS256 access tokens
 */
export class AccessTokenService {
  private readonly key: Uint8Array;
  private readonly now: Clock;
  readonly ttlSeconds: number;

  constructor(options: AccessTokenServiceOptions) {
    this.key = createHmacKey(options.secret);
    this.ttlSeconds = options.ttlHours * 60 * 60;
    this.now = options.now ?? systemClock;
  }

  async mint(userId: string, email: string): Promise<string> {
    const iat = Math.floor(this.now().getTime() / 1000);
    return signHmacJwt({ sub: userId, email }, this.key, iat, iat + this.ttlSeconds);
  }

  /**
   * Verify signature and expiry; any failure is an auth failure
   */
  async verify(token: string): Promise<AccessTokenClaims> {
    try {
      const payload = await verifyHmacJwt(token, this.key, this.now());
      return claimsSchema.parse(payload);
    } catch {
      throw ApiError.authFailure('Invalid or expired token');
    }
  }
}
