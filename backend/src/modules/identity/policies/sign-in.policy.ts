/**
 * src/modules/identity/policies/sign-in.policy.ts
 *
 * WHY:
 * - Pure decision: may this user sign in at all (before the password is checked)?
 *
 * RULES:
 * - Unconfirmed accounts are NotAllowed when requireConfirmedAccount/Email is set.
 * - NotAllowed wins over LockedOut (same order as the password sign-in flow).
 */

import type { SignInOptions } from '../identity.options';
import type { IdentityUser } from '../identity.types';
import { isLockedOut } from './lockout.policy';

export type PreSignInDecision = 'Allowed' | 'NotAllowed' | 'LockedOut';

export function canSignIn(
  user: Pick<IdentityUser, 'emailConfirmed' | 'phoneNumberConfirmed'>,
  opts: SignInOptions,
): boolean {
  if ((opts.requireConfirmedAccount || opts.requireConfirmedEmail) && !user.emailConfirmed) {
    return false;
  }
  if (opts.requireConfirmedPhoneNumber && !user.phoneNumberConfirmed) {
    return false;
  }
  return true;
}

export function decidePreSignIn(
  user: Pick<
    IdentityUser,
    'emailConfirmed' | 'phoneNumberConfirmed' | 'lockoutEnabled' | 'lockoutEnd' | 'accessFailedCount'
  >,
  opts: SignInOptions,
  nowMs: number,
): PreSignInDecision {
  if (!canSignIn(user, opts)) return 'NotAllowed';
  if (isLockedOut(user, nowMs)) return 'LockedOut';
  return 'Allowed';
}
