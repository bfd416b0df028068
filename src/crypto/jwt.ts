import * as jose from 'jose';

/**
 * JWT signing and verification utilities using jose library
 */

const HMAC_ALGORITHM = 'HS256';

/**
 * Turn a shared secret into an HMAC key for jose
 */
export function createHmacKey(secret: string): Uint8Array {
  return new TextEncoder().encode(secret);
}

/**
 * Sign a payload with HS256.
 * `issuedAt` and `expiresAt` are seconds since the epoch.
 */
export async function signHmacJwt(
  payload: jose.JWTPayload,
  key: Uint8Array,
  issuedAt: number,
  expiresAt: number
): Promise<string> {
  return new jose.SignJWT(payload)
    .setProtectedHeader({ alg: HMAC_ALGORITHM, typ: 'JWT' })
    .setIssuedAt(issuedAt)
    .setExpirationTime(expiresAt)
    .sign(key);
}

/**
 * Verify an HS256 JWT, checking expiry against `currentDate`
 */
export async function verifyHmacJwt(
  token: string,
  key: Uint8Array,
  currentDate: Date
): Promise<jose.JWTPayload> {
  const { payload } = await jose.jwtVerify(token, key, {
    algorithms: [HMAC_ALGORITHM],
    currentDate,
  });
  return payload;
}
