/**
 * Password Hasher - bcrypt with a cost factor fixed at construction.
 */

import bcrypt from 'bcryptjs';

// $2a$, $2b$ or $2y$, cost 04-31, 53 chars of salt + digest
const BCRYPT_HASH_PATTERN = /^\$2[aby]\$(0[4-9]|[12]\d|3[01])\$[./A-Za-z0-9]{53}$/;

export const DEFAULT_BCRYPT_ROUNDS = 12;

export class PasswordHasher {
  private readonly rounds: number;

  /**
   * @param rounds - bcrypt cost factor (4-31, default 12)
   */
  constructor(rounds: number = DEFAULT_BCRYPT_ROUNDS) {
    if (!Number.isInteger(rounds) || rounds < 4 || rounds > 31) {
      throw new Error(`Invalid bcrypt cost factor: ${rounds}`);
    }
    this.rounds = rounds;
  }

  async hash(password: string): Promise<string> {
    return bcrypt.hash(password, this.rounds);
  }

  /**
   * Compare a password against a stored hash.
   *
   * Returns false for a stored hash that is not a well-formed bcrypt string.
   */
  async verify(password: string, hash: string): Promise<boolean> {
    if (!BCRYPT_HASH_PATTERN.test(hash)) {
      return false;
    }
    return bcrypt.compare(password, hash);
  }
}
