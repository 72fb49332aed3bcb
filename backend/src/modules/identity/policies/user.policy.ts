/**
 * src/modules/identity/policies/user.policy.ts
 *
 * WHY:
 * - Pure format checks for user name and email. Uniqueness needs the store and
 *   lives in UserManager.
 */

import type { UserOptions } from '../identity.options';
import type { IdentityError } from '../identity.types';
import { identityError } from '../identity.errors';

// Deliberately loose: one "@", something on both sides, no whitespace.
const EMAIL = /^[^\s@]+@[^\s@]+$/;

export function normalizeKey(value: string): string {
  return value.normalize('NFKC').toUpperCase();
}

export function validateUserFormat(
  user: { userName: string; email: string },
  opts: UserOptions,
): IdentityError[] {
  const errors: IdentityError[] = [];

  const allowed = opts.allowedUserNameCharacters;
  if (!user.userName || [...user.userName].some((c) => allowed && !allowed.includes(c))) {
    errors.push(identityError('InvalidUserName', user.userName));
  }

  if (!EMAIL.test(user.email)) {
    errors.push(identityError('InvalidEmail', user.email));
  }

  return errors;
}
