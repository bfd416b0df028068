import { hashPassword, verifyPassword } from '../crypto/hash.js';

const DUMMY_PASSWORD = 'timing-equalizer-password-1';

/**
 * Password hashing with a fixed cost. All scrypt work runs on the libuv pool.
 */
export class CredentialService {
  private dummyHash: Promise<string> | null = null;

  constructor(private readonly cost: number) {}

  hash(password: string): Promise<string> {
    return hashPassword(password, this.cost);
  }

  verify(password: string, hash: string): Promise<boolean> {
    return verifyPassword(password, hash);
  }

  /**
   * Spend the same work as a real verification when there is no hash to check.
   * Always false.
   */
  async verifyAgainstDummy(password: string): Promise<false> {
    this.dummyHash ??= hashPassword(DUMMY_PASSWORD, this.cost);
    await verifyPassword(password, await this.dummyHash);
    return false;
  }
}
