import bcrypt from 'bcryptjs';

export const DEFAULT_BCRYPT_ROUNDS = 10;

/** bcrypt wrapper. Plaintext passwords go no further than this class. */
export class PasswordHasher {
  private placeholder: Promise<string> | null = null;

  constructor(private readonly rounds: number = DEFAULT_BCRYPT_ROUNDS) {}

  hash(password: string): Promise<string> {
    return bcrypt.hash(password, this.rounds);
  }

  /** A malformed hash verifies false instead of throwing. */
  async verify(password: string, hash: string): Promise<boolean> {
    try {
      return await bcrypt.compare(password, hash);
    } catch {
      return false;
    }
  }

  /**
   * Runs one comparison at the configured cost and always resolves false.
   * Used when no account matches, so a miss takes as long as a wrong password.
   */
  async verifyAbsent(password: string): Promise<false> {
    this.placeholder ??= this.hash('commonroom-absent-account');
    await this.verify(password, await this.placeholder);
    return false;
  }
}
