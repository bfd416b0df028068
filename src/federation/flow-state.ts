import { z } from 'zod';
import type { OidcFlowState } from '../types/token.js';
import { encrypt, decrypt } from '../crypto/encrypt.js';

const flowStateSchema = z.object({
  csrfToken: z.string().min(1),
  nonce: z.string().min(1),
  codeVerifier: z.string().min(1),
  issuedAt: z.number().int(),
});

/**
 * Encrypt flow state for the `oidc-flow` cookie
 */
export function sealFlowState(state: OidcFlowState, key: string): string {
  return encrypt(JSON.stringify(state), key);
}

/**
 * Decrypt and validate a flow cookie.
 * Null when it was tampered with, sealed under another key, or is older than `maxAgeMs`.
 */
export function openFlowState(
  sealed: string,
  key: string,
  now: Date,
  maxAgeMs: number
): OidcFlowState | null {
  const plaintext = decrypt(sealed, key);
  if (plaintext === null) {
    return null;
  }

  let json: unknown;
  try {
    json = JSON.parse(plaintext);
  } catch {
    return null;
  }

  const parsed = flowStateSchema.safeParse(json);
  if (!parsed.success) {
    return null;
  }

  const age = now.getTime() - parsed.data.issuedAt;
  if (age < 0 || age > maxAgeMs) {
    return null;
  }

  return parsed.data;
}
