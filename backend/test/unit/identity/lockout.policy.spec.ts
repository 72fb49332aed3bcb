import { describe, it, expect } from 'vitest';

import { createIdentityOptions } from '../../../src/modules/identity/identity.options';
import { decideAccessFailed, isLockedOut } from '../../../src/modules/identity/policies/lockout.policy';
import { canSignIn, decidePreSignIn } from '../../../src/modules/identity/policies/sign-in.policy';

const NOW = Date.parse('2026-01-01T00:00:00.000Z');
const lockout = createIdentityOptions().lockout;

const state = (overrides: Partial<{ lockoutEnabled: boolean; lockoutEnd: Date | null; accessFailedCount: number }>) => ({
  lockoutEnabled: true,
  lockoutEnd: null,
  accessFailedCount: 0,
  ...overrides,
});

describe('isLockedOut', () => {
  it('is locked only while lockoutEnd is in the future', () => {
    expect(isLockedOut(state({ lockoutEnd: new Date(NOW + 1000) }), NOW)).toBe(true);
    expect(isLockedOut(state({ lockoutEnd: new Date(NOW) }), NOW)).toBe(false);
    expect(isLockedOut(state({ lockoutEnd: null }), NOW)).toBe(false);
  });

  it('ignores lockoutEnd when lockout is disabled for the user', () => {
    expect(isLockedOut(state({ lockoutEnabled: false, lockoutEnd: new Date(NOW + 1000) }), NOW)).toBe(false);
  });
});

describe('decideAccessFailed', () => {
  it('counts failures below the threshold', () => {
    expect(decideAccessFailed(state({ accessFailedCount: 2 }), lockout, NOW)).toEqual({
      accessFailedCount: 3,
      lockoutEnd: null,
    });
  });

  it('locks for the default time span and resets the counter at the threshold', () => {
    expect(decideAccessFailed(state({ accessFailedCount: 4 }), lockout, NOW)).toEqual({
      accessFailedCount: 0,
      lockoutEnd: new Date(NOW + 5 * 60 * 1000),
    });
  });

  it('does not count users with lockout disabled', () => {
    expect(decideAccessFailed(state({ lockoutEnabled: false, accessFailedCount: 4 }), lockout, NOW)).toEqual({
      accessFailedCount: 4,
      lockoutEnd: null,
    });
  });
});

describe('sign-in gating', () => {
  const signIn = createIdentityOptions({ signIn: { requireConfirmedAccount: true } }).signIn;
  const user = {
    emailConfirmed: true,
    phoneNumberConfirmed: false,
    ...state({}),
  };

  it('allows a confirmed, unlocked user', () => {
    expect(decidePreSignIn(user, signIn, NOW)).toBe('Allowed');
  });

  it('blocks unconfirmed accounts when confirmation is required', () => {
    expect(canSignIn({ ...user, emailConfirmed: false }, signIn)).toBe(false);
    expect(decidePreSignIn({ ...user, emailConfirmed: false }, signIn, NOW)).toBe('NotAllowed');
  });

  it('lets unconfirmed accounts in when nothing is required', () => {
    const open = createIdentityOptions().signIn;
    expect(canSignIn({ ...user, emailConfirmed: false }, open)).toBe(true);
  });

  it('reports NotAllowed before LockedOut', () => {
    const lockedAndUnconfirmed = { ...user, emailConfirmed: false, lockoutEnd: new Date(NOW + 1000) };
    expect(decidePreSignIn(lockedAndUnconfirmed, signIn, NOW)).toBe('NotAllowed');
    expect(decidePreSignIn({ ...user, lockoutEnd: new Date(NOW + 1000) }, signIn, NOW)).toBe('LockedOut');
  });
});
