/**
 * src/modules/identity/policies/password.policy.ts
 *
 * WHY:
 * - Pure decision: does a candidate password satisfy the configured rules?
 * - Returns every failing rule (not just the first) so the form can show them all.
 *
 * RULES:
 * - Non-alphanumeric means anything outside [A-Za-z0-9].
 * - Unique chars counts distinct code points.
 */

import type { PasswordOptions } from '../identity.options';
import type { IdentityError } from '../identity.types';
import { identityError } from '../identity.errors';

const isDigit = (c: string) => c >= '0' && c <= '9';
const isLower = (c: string) => c >= 'a' && c <= 'z';
const isUpper = (c: string) => c >= 'A' && c <= 'Z';
const isLetterOrDigit = (c: string) => isDigit(c) || isLower(c) || isUpper(c);

export function validatePassword(password: string, opts: PasswordOptions): IdentityError[] {
  const errors: IdentityError[] = [];
  const chars = [...password];

  if (password.length < opts.requiredLength) {
    errors.push(identityError('PasswordTooShort', opts.requiredLength));
  }
  if (opts.requireNonAlphanumeric && chars.every(isLetterOrDigit)) {
    errors.push(identityError('PasswordRequiresNonAlphanumeric'));
  }
  if (opts.requireDigit && !chars.some(isDigit)) {
    errors.push(identityError('PasswordRequiresDigit'));
  }
  if (opts.requireLowercase && !chars.some(isLower)) {
    errors.push(identityError('PasswordRequiresLower'));
  }
  if (opts.requireUppercase && !chars.some(isUpper)) {
    errors.push(identityError('PasswordRequiresUpper'));
  }
  if (opts.requiredUniqueChars >= 1 && new Set(password).size < opts.requiredUniqueChars) {
    errors.push(identityError('PasswordRequiresUniqueChars', opts.requiredUniqueChars));
  }

  return errors;
}
