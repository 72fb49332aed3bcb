/**
 * backend/src/shared/security/token.ts
 *
 * WHY:
 * - Token generation should be consistent and strong across the system.
 * - Security/concurrency stamps, antiforgery tokens and recovery codes all come from here.
 *
 * HOW TO USE:
 * - const token = generateSecureToken()
 * - const code = generateRecoveryCode()  // "XXXXX-XXXXX"
 */

import { randomBytes, randomInt } from 'node:crypto';

export function generateSecureToken(bytes: number = 32): string {
  // URL-safe base64 (no + / =)
  return randomBytes(bytes).toString('base64url');
}

/** Upper-case, no vowels and no look-alike characters (0/O, 1/I/L, S/5, Z/2). */
export const RECOVERY_CODE_ALPHABET = '23456789BCDFGHJKMNPQRTVWXY';

export function generateRecoveryCode(): string {
  const pick = (n: number) =>
    Array.from({ length: n }, () => RECOVERY_CODE_ALPHABET[randomInt(RECOVERY_CODE_ALPHABET.length)]).join('');

  return `${pick(5)}-${pick(5)}`;
}
