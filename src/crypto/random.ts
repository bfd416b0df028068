import { randomBytes, randomUUID } from 'node:crypto';

/**
 * Generate cryptographically secure random bytes as hex string
 */
export function generateRandomHex(length: number): string {
  return randomBytes(length).toString('hex');
}

/**
 * Generate cryptographically secure random bytes as base64url string
 */
export function generateRandomBase64Url(length: number): string {
  return randomBytes(length).toString('base64url');
}

/**
 * Generate a refresh token secret
 */
export function generateRefreshToken(length: number = 32): string {
  return generateRandomBase64Url(length);
}

/**
 * Generate an email verification or password reset token
 */
export function generateActionToken(length: number = 32): string {
  return generateRandomHex(length);
}

/**
 * Generate a PKCE code verifier (43 characters at 32 bytes)
 */
export function generateCodeVerifier(length: number = 32): string {
  return generateRandomBase64Url(length);
}

/**
 * Generate a unique ID for records
 */
export function generateId(): string {
  return randomUUID();
}
