import { describe, it, expect } from 'vitest';

import { createIdentityOptions } from '../../../src/modules/identity/identity.options';
import { validatePassword } from '../../../src/modules/identity/policies/password.policy';

const opts = createIdentityOptions().password;
const codes = (password: string, o = opts) => validatePassword(password, o).map((e) => e.code);

describe('validatePassword', () => {
  it('accepts a password that meets every default rule', () => {
    expect(validatePassword('Passw0rd!', opts)).toEqual([]);
  });

  it('reports every failing rule, not just the first', () => {
    expect(codes('abc')).toEqual([
      'PasswordTooShort',
      'PasswordRequiresNonAlphanumeric',
      'PasswordRequiresDigit',
      'PasswordRequiresUpper',
    ]);
  });

  it('describes the length rule with the configured length', () => {
    expect(validatePassword('A1!a', opts)[0]).toEqual({
      code: 'PasswordTooShort',
      description: 'Passwords must be at least 6 characters.',
    });
  });

  it('counts distinct characters when requiredUniqueChars is set', () => {
    const strict = { ...opts, requiredUniqueChars: 5 };
    expect(codes('Aa1!Aa1!', strict)).toEqual(['PasswordRequiresUniqueChars']);
    expect(codes('Ab1!cd', strict)).toEqual([]);
  });

  it('skips rules that are turned off', () => {
    const relaxed = {
      ...opts,
      requireDigit: false,
      requireUppercase: false,
      requireNonAlphanumeric: false,
    };
    expect(codes('lowercase', relaxed)).toEqual([]);
  });
});
