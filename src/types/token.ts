/**
 * Stored refresh token. The secret itself is never stored, only its SHA-256.
 */
export interface RefreshToken {
  id: string;
  userId: string;
  /** Stable across rotations; each rotation creates a new row id */
  sessionId: string;
  tokenHash: string;
  deviceInfo?: string;
  ipAddress?: string;
  expiresAt: Date;
  createdAt: Date;
}

export interface CreateRefreshTokenInput {
  userId: string;
  sessionId: string;
  tokenHash: string;
  deviceInfo?: string;
  ipAddress?: string;
  expiresAt: Date;
}

/**
 * Outcome of an atomic refresh token rotation
 */
export type RotateRefreshTokenResult =
  | { status: 'rotated'; previous: RefreshToken; token: RefreshToken }
  | { status: 'not_found' }
  | { status: 'expired'; previous: RefreshToken };

export type ActionTokenPurpose = 'email_verification' | 'password_reset';

/**
 * Single-use token for email verification or password reset
 */
export interface ActionToken {
  id: string;
  userId: string;
  purpose: ActionTokenPurpose;
  tokenHash: string;
  expiresAt: Date;
  usedAt?: Date;
  createdAt: Date;
}

export interface CreateActionTokenInput {
  userId: string;
  purpose: ActionTokenPurpose;
  tokenHash: string;
  expiresAt: Date;
}

/**
 * Claims carried by an access token
 */
export interface AccessTokenClaims {
  sub: string;
  email: string;
  iat: number;
  exp: number;
}

/**
 * State kept in the encrypted flow cookie between the redirect and the callback
 */
export interface OidcFlowState {
  csrfToken: string;
  nonce: string;
  codeVerifier: string;
  issuedAt: number;
}
