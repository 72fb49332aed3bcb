/**
 * src/modules/identity/policies/lockout.policy.ts
 *
 * WHY:
 * - Pure lockout bookkeeping, kept out of UserManager so the arithmetic is unit-tested.
 *
 * RULES:
 * - A user is locked out only while lockoutEnabled and lockoutEnd is in the future.
 * - Reaching maxFailedAccessAttempts locks for defaultLockoutTimeSpanMs and resets the counter.
 * - Users with lockout disabled are never counted.
 */

import type { LockoutOptions } from '../identity.options';
import type { IdentityUser } from '../identity.types';

type LockoutState = Pick<IdentityUser, 'lockoutEnabled' | 'lockoutEnd' | 'accessFailedCount'>;

export function isLockedOut(user: LockoutState, nowMs: number): boolean {
  if (!user.lockoutEnabled) return false;
  return user.lockoutEnd !== null && user.lockoutEnd.getTime() > nowMs;
}

export function decideAccessFailed(
  user: LockoutState,
  opts: LockoutOptions,
  nowMs: number,
): { accessFailedCount: number; lockoutEnd: Date | null } {
  if (!user.lockoutEnabled) {
    return { accessFailedCount: user.accessFailedCount, lockoutEnd: user.lockoutEnd };
  }

  const count = user.accessFailedCount + 1;
  if (count < opts.maxFailedAccessAttempts) {
    return { accessFailedCount: count, lockoutEnd: user.lockoutEnd };
  }

  return {
    accessFailedCount: 0,
    lockoutEnd: new Date(nowMs + opts.defaultLockoutTimeSpanMs),
  };
}
