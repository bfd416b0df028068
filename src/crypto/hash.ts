import { createHash, timingSafeEqual, randomBytes, scrypt as scryptCallback } from 'node:crypto';

const SCRYPT_BLOCK_SIZE = 8;
const SCRYPT_PARALLELIZATION = 1;
const SCRYPT_KEY_LENGTH = 64;
const SCRYPT_SALT_LENGTH = 16;

interface ScryptParams {
  N: number;
  r: number;
  p: number;
}

/**
 * Promisified scrypt. Runs on the libuv thread pool, never on the event loop.
 */
function scryptAsync(
  password: string,
  salt: Buffer,
  keyLength: number,
  params: ScryptParams
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    // Node rejects N > 2^14 at r=8 under the default 32 MiB maxmem
    const maxmem = 256 * params.N * params.r;
    scryptCallback(password, salt, keyLength, { ...params, maxmem }, (err, derivedKey) => {
      if (err) reject(err);
      else resolve(derivedKey);
    });
  });
}

/**
 * Hash a value using SHA-256, hex encoded.
 * Used for storing refresh tokens and action tokens.
 */
export function sha256(value: string): string {
  return createHash('sha256').update(value, 'utf8').digest('hex');
}

/**
 * Hash a value using SHA-256 and return as base64url
 */
export function sha256Base64Url(value: string): string {
  return createHash('sha256').update(value, 'utf8').digest('base64url');
}

/**
 * Compare two strings in constant time
 */
export function constantTimeCompare(a: string, b: string): boolean {
  const bufA = Buffer.from(a, 'utf8');
  const bufB = Buffer.from(b, 'utf8');

  if (bufA.length !== bufB.length) {
    return false;
  }

  return timingSafeEqual(bufA, bufB);
}

/**
 * Hash a password using scrypt.
 * Returns format: $scrypt$N$r$p$salt$hash
 */
export async function hashPassword(password: string, cost: number): Promise<string> {
  const salt = randomBytes(SCRYPT_SALT_LENGTH);
  const params = { N: cost, r: SCRYPT_BLOCK_SIZE, p: SCRYPT_PARALLELIZATION };

  const hash = await scryptAsync(password, salt, SCRYPT_KEY_LENGTH, params);

  return `$scrypt$${params.N}$${params.r}$${params.p}$${salt.toString('base64')}$${hash.toString('base64')}`;
}

function parseScryptHash(
  encoded: string
): { params: ScryptParams; salt: Buffer; hash: Buffer } | null {
  const parts = encoded.split('$');

  // ['', 'scrypt', N, r, p, salt, hash]
  if (parts.length !== 7 || parts[0] !== '' || parts[1] !== 'scrypt') {
    return null;
  }

  const [, , rawN, rawR, rawP, rawSalt, rawHash] = parts;
  if (!rawN || !rawR || !rawP || !rawSalt || !rawHash) {
    return null;
  }
  if (![rawN, rawR, rawP].every((v) => /^\d+$/.test(v))) {
    return null;
  }

  const salt = Buffer.from(rawSalt, 'base64');
  const hash = Buffer.from(rawHash, 'base64');
  if (salt.length === 0 || hash.length === 0) {
    return null;
  }

  return {
    params: {
      N: parseInt(rawN, 10),
      r: parseInt(rawR, 10),
      p: parseInt(rawP, 10),
    },
    salt,
    hash,
  };
}

/**
 * Verify a password against a stored scrypt hash.
 * Malformed hashes and scrypt failures verify as false.
 */
export async function verifyPassword(password: string, encoded: string): Promise<boolean> {
  const parsed = parseScryptHash(encoded);
  if (!parsed) {
    return false;
  }

  let derived: Buffer;
  try {
    derived = await scryptAsync(password, parsed.salt, parsed.hash.length, parsed.params);
  } catch {
    return false;
  }

  return timingSafeEqual(parsed.hash, derived);
}

/**
 * Hash for token lookup (quick hash, input is already high-entropy)
 */
export function hashToken(token: string): string {
  return sha256(token);
}

/**
 * Short fingerprint of a token for log lines
 */
export function tokenFingerprint(token: string): string {
  return sha256(token).slice(0, 8);
}
