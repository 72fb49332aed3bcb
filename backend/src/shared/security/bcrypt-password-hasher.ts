/**
 * backend/src/shared/security/bcrypt-password-hasher.ts
 *
 * RULES:
 * - Cost comes from BCRYPT_COST (tests run with 4).
 * - A stored hash with a different cost verifies as SuccessRehashNeeded, so
 *   raising the cost upgrades hashes as users sign in.
 * - Anything that is not a bcrypt hash verifies as Failed.
 */

import bcrypt from 'bcrypt';

import type { PasswordHasher, PasswordVerificationResult } from './password-hasher';

const BCRYPT_HASH = /^\$2[aby]\$(\d{2})\$/;

export class BcryptPasswordHasher implements PasswordHasher {
  constructor(private readonly opts: { cost: number }) {}

  hash(plain: string): Promise<string> {
    return bcrypt.hash(plain, this.opts.cost);
  }

  async verify(plain: string, storedHash: string): Promise<PasswordVerificationResult> {
    const match = BCRYPT_HASH.exec(storedHash);
    if (!match) return 'Failed';

    if (!(await bcrypt.compare(plain, storedHash))) return 'Failed';
    return Number(match[1]) === this.opts.cost ? 'Success' : 'SuccessRehashNeeded';
  }
}
