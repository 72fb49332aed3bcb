import { describe, it, expect } from 'vitest';

import type { IdentityResult } from '../../../src/modules/identity/identity.types';
import { BcryptPasswordHasher } from '../../../src/shared/security/bcrypt-password-hasher';
import { createUserManagerFixture } from '../../helpers/identity-fixtures';

const errorCodes = (result: IdentityResult) => (result.succeeded ? [] : result.errors.map((e) => e.code));

describe('UserManager', () => {
  describe('create', () => {
    it('stores the user with normalized keys and a hashed password', async () => {
      const { userManager, createUser } = createUserManagerFixture();
      const user = await createUser('Ada@Example.com');

      const stored = await userManager.findByEmail('ada@example.COM');
      expect(stored?.id).toBe(user.id);
      expect(stored?.normalizedEmail).toBe('ADA@EXAMPLE.COM');
      expect(stored?.normalizedUserName).toBe('ADA@EXAMPLE.COM');
      expect(stored?.passwordHash).not.toBe('Passw0rd!');
      expect(stored?.emailConfirmed).toBe(false);
      expect(stored?.lockoutEnabled).toBe(true);
    });

    it('rejects a duplicate user name and email', async () => {
      const { userManager, createUser } = createUserManagerFixture();
      await createUser('ada@example.com');

      const dup = userManager.newUser({ userName: 'ADA@example.com', email: 'ADA@example.com' });
      expect(errorCodes(await userManager.create(dup, 'Passw0rd!'))).toEqual(['DuplicateUserName', 'DuplicateEmail']);
    });

    it('returns every password rule failure and stores nothing', async () => {
      const { userManager } = createUserManagerFixture();
      const user = userManager.newUser({ userName: 'weak@example.com', email: 'weak@example.com' });

      expect(errorCodes(await userManager.create(user, 'weak'))).toEqual([
        'PasswordTooShort',
        'PasswordRequiresNonAlphanumeric',
        'PasswordRequiresDigit',
        'PasswordRequiresUpper',
      ]);
      expect(await userManager.findById(user.id)).toBeNull();
    });

    it('rejects user names with characters outside the allowed set', async () => {
      const { userManager } = createUserManagerFixture();
      const user = userManager.newUser({ userName: 'ada lovelace', email: 'ada@example.com' });

      const result = await userManager.create(user, 'Passw0rd!');
      expect(result).toEqual({
        succeeded: false,
        errors: [
          {
            code: 'InvalidUserName',
            description: "Username 'ada lovelace' is invalid, can only contain letters or digits.",
          },
        ],
      });
    });
  });

  describe('concurrency', () => {
    it('fails an update made from a stale copy', async () => {
      const { userManager, createUser } = createUserManagerFixture();
      const user = await createUser('ada@example.com');

      const first = await userManager.findById(user.id);
      const second = await userManager.findById(user.id);
      if (!first || !second) throw new Error('user not found');

      expect((await userManager.setPhoneNumber(first, '+1 555 0100')).succeeded).toBe(true);
      expect(errorCodes(await userManager.setPhoneNumber(second, '+1 555 0199'))).toEqual(['ConcurrencyFailure']);
      expect((await userManager.findById(user.id))?.phoneNumber).toBe('+1 555 0100');
    });
  });

  describe('email confirmation', () => {
    it('confirms the email with a valid token', async () => {
      const { userManager, createUser } = createUserManagerFixture();
      const user = await createUser('ada@example.com');

      const token = userManager.generateEmailConfirmationToken(user);
      expect((await userManager.confirmEmail(user, token)).succeeded).toBe(true);
      expect((await userManager.findById(user.id))?.emailConfirmed).toBe(true);
    });

    it('rejects a bad token', async () => {
      const { userManager, createUser } = createUserManagerFixture();
      const user = await createUser('ada@example.com');

      expect(errorCodes(await userManager.confirmEmail(user, 'bogus.token'))).toEqual(['InvalidToken']);
    });
  });

  describe('passwords', () => {
    it('reset rotates the security stamp, so the same token cannot be used twice', async () => {
      const { userManager, createUser } = createUserManagerFixture();
      const user = await createUser('ada@example.com');
      const stamp = user.securityStamp;

      const token = userManager.generatePasswordResetToken(user);
      expect((await userManager.resetPassword(user, token, 'NewPassw0rd!')).succeeded).toBe(true);
      expect(user.securityStamp).not.toBe(stamp);
      expect(await userManager.checkPassword(user, 'NewPassw0rd!')).toBe(true);

      expect(errorCodes(await userManager.resetPassword(user, token, 'Another0ne!'))).toEqual(['InvalidToken']);
    });

    it('changePassword requires the current password', async () => {
      const { userManager, createUser } = createUserManagerFixture();
      const user = await createUser('ada@example.com');

      expect(errorCodes(await userManager.changePassword(user, 'wrong', 'NewPassw0rd!'))).toEqual(['PasswordMismatch']);
      expect((await userManager.changePassword(user, 'Passw0rd!', 'NewPassw0rd!')).succeeded).toBe(true);
      expect(await userManager.checkPassword(user, 'Passw0rd!')).toBe(false);
    });
    it('rehashes a password stored with an older cost and keeps the security stamp', async () => {
      const { userManager, store, createUser } = createUserManagerFixture();
      const user = await createUser('ada@example.com');
      const legacyHash = await new BcryptPasswordHasher({ cost: 5 }).hash('Passw0rd!');
      await store.update({ ...user, passwordHash: legacyHash }, user.concurrencyStamp);
      user.passwordHash = legacyHash;
      const stamp = user.securityStamp;

      expect(await userManager.checkPassword(user, 'Passw0rd!')).toBe(true);

      const stored = await store.findById(user.id);
      expect(stored?.passwordHash).toMatch(/^\$2[aby]\$04\$/);
      expect(stored?.securityStamp).toBe(stamp);
    });
  });

  describe('email change', () => {
    it('sets the new address as confirmed when the token matches the address', async () => {
      const { userManager, createUser } = createUserManagerFixture();
      const user = await createUser('ada@example.com');

      const token = userManager.generateChangeEmailToken(user, 'ada@new.example.com');
      expect(errorCodes(await userManager.changeEmail(user, 'eve@new.example.com', token))).toEqual(['InvalidToken']);
      expect((await userManager.changeEmail(user, 'ada@new.example.com', token)).succeeded).toBe(true);

      const stored = await userManager.findByEmail('ada@new.example.com');
      expect(stored?.email).toBe('ada@new.example.com');
      expect(stored?.emailConfirmed).toBe(true);
    });

    it('rejects an address already used by someone else', async () => {
      const { userManager, createUser } = createUserManagerFixture();
      const user = await createUser('ada@example.com');
      await createUser('taken@example.com');

      const token = userManager.generateChangeEmailToken(user, 'taken@example.com');
      expect(errorCodes(await userManager.changeEmail(user, 'taken@example.com', token))).toEqual(['DuplicateEmail']);
    });
  });

  describe('lockout', () => {
    it('locks the user after five failures and unlocks when the lockout ends', async () => {
      const { userManager, createUser, clock } = createUserManagerFixture();
      const user = await createUser('ada@example.com');

      for (let i = 0; i < 4; i++) await userManager.accessFailed(user);
      expect(user.accessFailedCount).toBe(4);
      expect(userManager.isLockedOut(user)).toBe(false);

      await userManager.accessFailed(user);
      expect(user.accessFailedCount).toBe(0);
      expect(userManager.isLockedOut(user)).toBe(true);

      clock.now += 5 * 60 * 1000;
      expect(userManager.isLockedOut(user)).toBe(false);
    });

    it('does not count failures for users with lockout disabled', async () => {
      const { userManager, createUser } = createUserManagerFixture({ lockout: { allowedForNewUsers: false } });
      const user = await createUser('ada@example.com');

      for (let i = 0; i < 10; i++) await userManager.accessFailed(user);
      expect(user.accessFailedCount).toBe(0);
      expect(userManager.isLockedOut(user)).toBe(false);
    });
  });

  describe('two-factor', () => {
    it('creates an authenticator key and verifies its codes', async () => {
      const { userManager, createUser, totp } = createUserManagerFixture();
      const user = await createUser('ada@example.com');

      expect(await userManager.hasAuthenticator(user)).toBe(false);
      await userManager.resetAuthenticatorKey(user);

      const key = await userManager.getAuthenticatorKey(user);
      if (!key) throw new Error('no authenticator key');
      const code = totp.generate(key);
      expect(await userManager.verifyAuthenticatorCode(user, code)).toBe(true);

      const wrong = `${(Number(code[0]) + 5) % 10}${code.slice(1)}`;
      expect(await userManager.verifyAuthenticatorCode(user, wrong)).toBe(false);
    });

    it('recovery codes are single use and case-insensitive', async () => {
      const { userManager, createUser } = createUserManagerFixture();
      const user = await createUser('ada@example.com');

      const codes = await userManager.generateNewTwoFactorRecoveryCodes(user);
      expect(codes).toHaveLength(10);
      expect(codes.every((c) => /^[2-9BCDFGHJKMNPQRTVWXY]{5}-[2-9BCDFGHJKMNPQRTVWXY]{5}$/.test(c))).toBe(true);
      expect(await userManager.countRecoveryCodes(user)).toBe(10);

      const [first = ''] = codes;
      expect((await userManager.redeemTwoFactorRecoveryCode(user, ` ${first.toLowerCase()} `)).succeeded).toBe(true);
      expect(await userManager.countRecoveryCodes(user)).toBe(9);
      expect(errorCodes(await userManager.redeemTwoFactorRecoveryCode(user, first))).toEqual([
        'RecoveryCodeRedemptionFailed',
      ]);
    });

    it('generating new codes replaces the old ones', async () => {
      const { userManager, createUser } = createUserManagerFixture();
      const user = await createUser('ada@example.com');

      const [old = ''] = await userManager.generateNewTwoFactorRecoveryCodes(user);
      await userManager.generateNewTwoFactorRecoveryCodes(user, 3);

      expect(await userManager.countRecoveryCodes(user)).toBe(3);
      expect((await userManager.redeemTwoFactorRecoveryCode(user, old)).succeeded).toBe(false);
    });
  });

  describe('personal data', () => {
    it('lists profile fields, external logins and the authenticator key, but no secrets', async () => {
      const { userManager, createUser, store } = createUserManagerFixture();
      const user = await createUser('ada@example.com');
      store.addLogin(user.id, { loginProvider: 'Example', providerKey: 'ext-123', providerDisplayName: null });
      await userManager.resetAuthenticatorKey(user);
      const key = await userManager.getAuthenticatorKey(user);

      expect(await userManager.getPersonalData(user)).toEqual({
        Id: user.id,
        UserName: 'ada@example.com',
        Email: 'ada@example.com',
        EmailConfirmed: 'false',
        PhoneNumber: 'null',
        PhoneNumberConfirmed: 'false',
        TwoFactorEnabled: 'false',
        'Example external login provider key': 'ext-123',
        'Authenticator Key': key,
      });
    });
  });

  it('delete removes the user and their tokens', async () => {
    const { userManager, createUser, store } = createUserManagerFixture();
    const user = await createUser('ada@example.com');
    await userManager.resetAuthenticatorKey(user);

    await userManager.delete(user);
    expect(await userManager.findById(user.id)).toBeNull();
    expect(await store.getToken(user.id, 'Identity', 'AuthenticatorKey')).toBeNull();
  });
});
