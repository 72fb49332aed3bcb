/**
 * backend/src/shared/security/password-hasher.ts
 *
 * UserManager depends on this interface, never on bcrypt.
 * `SuccessRehashNeeded` means the password is right but the stored hash was made
 * with other parameters (e.g. BCRYPT_COST was raised); the caller re-hashes it.
 */

export type PasswordVerificationResult = 'Failed' | 'Success' | 'SuccessRehashNeeded';

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, storedHash: string): Promise<PasswordVerificationResult>;
}
