/**
 * src/modules/identity/user-manager.ts
 *
 * WHY:
 * - Every read and write of a user record goes through here: creation, password
 *   and email changes, tokens, lockout bookkeeping, two-factor state.
 * - Controllers and SignInManager never touch the store directly.
 *
 * RULES:
 * - Failures a user can fix come back as IdentityResult; only infrastructure errors throw.
 * - Every write rotates the concurrency stamp. A stale record fails with ConcurrencyFailure.
 * - Credential changes also rotate the security stamp (revokes sessions and tokens).
 * - A successful write is applied to the record passed in, so callers keep using it.
 * - Never log passwords, tokens or recovery codes.
 */

import { randomUUID } from 'node:crypto';

import type { Logger } from '../../shared/logger/logger';
import type { KeyedHasher } from '../../shared/security/keyed-hasher';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import { generateRecoveryCode } from '../../shared/security/token';

import type { UserStore } from './dal/user-store';
import { identityError } from './identity.errors';
import type { IdentityOptions } from './identity.options';
import { type IdentityError, IdentityResult, type IdentityUser } from './identity.types';
import { decideAccessFailed, isLockedOut } from './policies/lockout.policy';
import { validatePassword } from './policies/password.policy';
import { normalizeKey, validateUserFormat } from './policies/user.policy';
import type { AuthenticatorTokenProvider } from './tokens/authenticator-token-provider';
import type { DataProtectorTokenProvider } from './tokens/data-protector-token-provider';
import {
  AUTHENTICATOR_KEY_TOKEN,
  INTERNAL_LOGIN_PROVIDER,
  RECOVERY_CODES_TOKEN,
  TokenPurposes,
} from './tokens/token-purposes';

export type UserManagerDeps = {
  store: UserStore;
  passwordHasher: PasswordHasher;
  keyedHasher: KeyedHasher;
  tokenProvider: DataProtectorTokenProvider;
  authenticatorTokenProvider: AuthenticatorTokenProvider;
  options: IdentityOptions;
  logger: Logger;
  now?: () => number;
};

const newStamp = () => randomUUID().replace(/-/g, '').toUpperCase();

export class UserManager {
  private readonly store: UserStore;
  private readonly now: () => number;

  constructor(private readonly deps: UserManagerDeps) {
    this.store = deps.store;
    this.now = deps.now ?? Date.now;
  }

  get options(): IdentityOptions {
    return this.deps.options;
  }

  // ── construction / lookup ──────────────────────────────────

  /** Unsaved record with fresh stamps. Call create() to persist it. */
  newUser(input: { userName: string; email: string }): IdentityUser {
    return {
      id: randomUUID(),
      userName: input.userName,
      normalizedUserName: normalizeKey(input.userName),
      email: input.email,
      normalizedEmail: normalizeKey(input.email),
      emailConfirmed: false,
      passwordHash: null,
      securityStamp: newStamp(),
      concurrencyStamp: newStamp(),
      phoneNumber: null,
      phoneNumberConfirmed: false,
      twoFactorEnabled: false,
      lockoutEnd: null,
      lockoutEnabled: this.deps.options.lockout.allowedForNewUsers,
      accessFailedCount: 0,
    };
  }

  findById(userId: string): Promise<IdentityUser | null> {
    return this.store.findById(userId);
  }

  findByName(userName: string): Promise<IdentityUser | null> {
    return this.store.findByNormalizedUserName(normalizeKey(userName));
  }

  findByEmail(email: string): Promise<IdentityUser | null> {
    return this.store.findByNormalizedEmail(normalizeKey(email));
  }

  // ── create / update / delete ───────────────────────────────

  async create(user: IdentityUser, password?: string): Promise<IdentityResult> {
    const errors = await this.validateUser(user);
    if (password !== undefined) {
      errors.push(...validatePassword(password, this.deps.options.password));
    }
    if (errors.length > 0) return IdentityResult.failed(...errors);

    if (password !== undefined) {
      user.passwordHash = await this.deps.passwordHasher.hash(password);
    }

    const outcome = await this.store.create(user);
    if (outcome === 'duplicate') {
      return IdentityResult.failed(identityError('DuplicateUserName', user.userName));
    }

    this.deps.logger.info('identity.user.created', { userId: user.id });
    return IdentityResult.success;
  }

  async delete(user: IdentityUser): Promise<IdentityResult> {
    await this.store.delete(user.id);
    this.deps.logger.info('identity.user.deleted', { userId: user.id });
    return IdentityResult.success;
  }

  async setUserName(user: IdentityUser, userName: string): Promise<IdentityResult> {
    const candidate = { ...user, userName, normalizedUserName: normalizeKey(userName) };
    const errors = await this.validateUser(candidate);
    if (errors.length > 0) return IdentityResult.failed(...errors);

    return this.update(user, {
      userName,
      normalizedUserName: candidate.normalizedUserName,
      securityStamp: newStamp(),
    });
  }

  async updateSecurityStamp(user: IdentityUser): Promise<IdentityResult> {
    return this.update(user, { securityStamp: newStamp() });
  }

  private async validateUser(user: IdentityUser): Promise<IdentityError[]> {
    const errors = validateUserFormat(user, this.deps.options.user);

    const byName = await this.store.findByNormalizedUserName(user.normalizedUserName);
    if (byName && byName.id !== user.id) {
      errors.push(identityError('DuplicateUserName', user.userName));
    }

    if (this.deps.options.user.requireUniqueEmail) {
      const byEmail = await this.store.findByNormalizedEmail(user.normalizedEmail);
      if (byEmail && byEmail.id !== user.id) {
        errors.push(identityError('DuplicateEmail', user.email));
      }
    }

    return errors;
  }

  /**
   * Writes `changes` with a new concurrency stamp.
   * On success the changes are applied to `user` in place.
   */
  private async update(user: IdentityUser, changes: Partial<IdentityUser>): Promise<IdentityResult> {
    const next: IdentityUser = { ...user, ...changes, concurrencyStamp: newStamp() };

    const outcome = await this.store.update(next, user.concurrencyStamp);
    if (outcome === 'concurrency_failure') {
      return IdentityResult.failed(identityError('ConcurrencyFailure'));
    }
    if (outcome === 'duplicate') {
      return IdentityResult.failed(identityError('DuplicateEmail', next.email));
    }

    Object.assign(user, next);
    return IdentityResult.success;
  }

  // ── passwords ──────────────────────────────────────────────

  hasPassword(user: IdentityUser): boolean {
    return user.passwordHash !== null;
  }

  async checkPassword(user: IdentityUser, password: string): Promise<boolean> {
    if (!user.passwordHash) return false;

    const result = await this.deps.passwordHasher.verify(password, user.passwordHash);
    if (result === 'SuccessRehashNeeded') {
      // Same password, new hash parameters: the security stamp stays.
      const passwordHash = await this.deps.passwordHasher.hash(password);
      const updated = await this.update(user, { passwordHash });
      if (updated.succeeded) this.deps.logger.info('identity.password.rehashed', { userId: user.id });
    }
    return result !== 'Failed';
  }

  async changePassword(
    user: IdentityUser,
    currentPassword: string,
    newPassword: string,
  ): Promise<IdentityResult> {
    if (!(await this.checkPassword(user, currentPassword))) {
      this.deps.logger.warn('identity.password.change_mismatch', { userId: user.id });
      return IdentityResult.failed(identityError('PasswordMismatch'));
    }
    return this.setPassword(user, newPassword);
  }

  generatePasswordResetToken(user: IdentityUser): string {
    return this.deps.tokenProvider.generate(TokenPurposes.resetPassword, user);
  }

  async resetPassword(user: IdentityUser, token: string, newPassword: string): Promise<IdentityResult> {
    if (!this.deps.tokenProvider.validate(TokenPurposes.resetPassword, token, user)) {
      return IdentityResult.failed(identityError('InvalidToken'));
    }
    return this.setPassword(user, newPassword);
  }

  private async setPassword(user: IdentityUser, password: string): Promise<IdentityResult> {
    const errors = validatePassword(password, this.deps.options.password);
    if (errors.length > 0) return IdentityResult.failed(...errors);

    const passwordHash = await this.deps.passwordHasher.hash(password);
    return this.update(user, { passwordHash, securityStamp: newStamp() });
  }

  // ── email ──────────────────────────────────────────────────

  generateEmailConfirmationToken(user: IdentityUser): string {
    return this.deps.tokenProvider.generate(TokenPurposes.emailConfirmation, user);
  }

  async confirmEmail(user: IdentityUser, token: string): Promise<IdentityResult> {
    if (!this.deps.tokenProvider.validate(TokenPurposes.emailConfirmation, token, user)) {
      return IdentityResult.failed(identityError('InvalidToken'));
    }
    return this.update(user, { emailConfirmed: true });
  }

  generateChangeEmailToken(user: IdentityUser, newEmail: string): string {
    return this.deps.tokenProvider.generate(TokenPurposes.changeEmail(newEmail), user);
  }

  /** Sets the new address as confirmed (the token proves ownership). */
  async changeEmail(user: IdentityUser, newEmail: string, token: string): Promise<IdentityResult> {
    if (!this.deps.tokenProvider.validate(TokenPurposes.changeEmail(newEmail), token, user)) {
      return IdentityResult.failed(identityError('InvalidToken'));
    }

    const candidate = { ...user, email: newEmail, normalizedEmail: normalizeKey(newEmail) };
    const errors = await this.validateUser(candidate);
    if (errors.length > 0) return IdentityResult.failed(...errors);

    return this.update(user, {
      email: newEmail,
      normalizedEmail: candidate.normalizedEmail,
      emailConfirmed: true,
      securityStamp: newStamp(),
    });
  }

  // ── phone ──────────────────────────────────────────────────

  async setPhoneNumber(user: IdentityUser, phoneNumber: string | null): Promise<IdentityResult> {
    return this.update(user, {
      phoneNumber,
      phoneNumberConfirmed: false,
      securityStamp: newStamp(),
    });
  }

  // ── lockout ────────────────────────────────────────────────

  isLockedOut(user: IdentityUser): boolean {
    return isLockedOut(user, this.now());
  }

  /** Counts a failed attempt; locks the user once the threshold is reached. */
  async accessFailed(user: IdentityUser): Promise<IdentityResult> {
    if (!user.lockoutEnabled) return IdentityResult.success;

    const next = decideAccessFailed(user, this.deps.options.lockout, this.now());
    const result = await this.update(user, next);

    if (result.succeeded && next.lockoutEnd && next.accessFailedCount === 0) {
      this.deps.logger.warn('identity.lockout.locked', {
        userId: user.id,
        lockoutEnd: next.lockoutEnd.toISOString(),
      });
    }
    return result;
  }

  async resetAccessFailedCount(user: IdentityUser): Promise<IdentityResult> {
    if (user.accessFailedCount === 0) return IdentityResult.success;
    return this.update(user, { accessFailedCount: 0 });
  }

  // ── two-factor ─────────────────────────────────────────────

  getAuthenticatorKey(user: IdentityUser): Promise<string | null> {
    return this.store.getToken(user.id, INTERNAL_LOGIN_PROVIDER, AUTHENTICATOR_KEY_TOKEN);
  }

  async resetAuthenticatorKey(user: IdentityUser): Promise<IdentityResult> {
    const key = this.deps.authenticatorTokenProvider.generateKey();
    await this.store.setToken(user.id, INTERNAL_LOGIN_PROVIDER, AUTHENTICATOR_KEY_TOKEN, key);
    return this.update(user, { securityStamp: newStamp() });
  }

  async hasAuthenticator(user: IdentityUser): Promise<boolean> {
    return (await this.getAuthenticatorKey(user)) !== null;
  }

  async verifyAuthenticatorCode(user: IdentityUser, code: string): Promise<boolean> {
    const key = await this.getAuthenticatorKey(user);
    if (!key) return false;
    return this.deps.authenticatorTokenProvider.validate(code, key);
  }

  async setTwoFactorEnabled(user: IdentityUser, enabled: boolean): Promise<IdentityResult> {
    return this.update(user, { twoFactorEnabled: enabled, securityStamp: newStamp() });
  }

  /** Replaces any existing recovery codes. Returns the plaintext codes (shown once). */
  async generateNewTwoFactorRecoveryCodes(user: IdentityUser, count?: number): Promise<string[]> {
    const n = count ?? this.deps.options.tokens.recoveryCodeCount;
    const codes = Array.from({ length: n }, () => generateRecoveryCode());

    await this.storeRecoveryCodeHashes(user, codes.map((c) => this.deps.keyedHasher.hash(c)));
    this.deps.logger.info('identity.2fa.recovery_codes_generated', { userId: user.id, count: n });
    return codes;
  }

  async countRecoveryCodes(user: IdentityUser): Promise<number> {
    return (await this.loadRecoveryCodeHashes(user)).length;
  }

  /** Single use: a redeemed code is removed. */
  async redeemTwoFactorRecoveryCode(user: IdentityUser, code: string): Promise<IdentityResult> {
    const hashes = await this.loadRecoveryCodeHashes(user);
    const submitted = code.trim().toUpperCase();

    const match = hashes.find((h) => this.deps.keyedHasher.verify(submitted, h));
    if (!match) {
      return IdentityResult.failed(identityError('RecoveryCodeRedemptionFailed'));
    }

    await this.storeRecoveryCodeHashes(
      user,
      hashes.filter((h) => h !== match),
    );
    return IdentityResult.success;
  }

  private async loadRecoveryCodeHashes(user: IdentityUser): Promise<string[]> {
    const raw = await this.store.getToken(user.id, INTERNAL_LOGIN_PROVIDER, RECOVERY_CODES_TOKEN);
    return raw ? raw.split(';').filter(Boolean) : [];
  }

  private async storeRecoveryCodeHashes(user: IdentityUser, hashes: string[]): Promise<void> {
    await this.store.setToken(user.id, INTERNAL_LOGIN_PROVIDER, RECOVERY_CODES_TOKEN, hashes.join(';'));
  }

  // ── personal data ──────────────────────────────────────────

  /** Everything the user may download about themselves. No hashes, stamps or codes. */
  async getPersonalData(user: IdentityUser): Promise<Record<string, string>> {
    const data: Record<string, string> = {
      Id: user.id,
      UserName: user.userName,
      Email: user.email,
      EmailConfirmed: String(user.emailConfirmed),
      PhoneNumber: user.phoneNumber ?? 'null',
      PhoneNumberConfirmed: String(user.phoneNumberConfirmed),
      TwoFactorEnabled: String(user.twoFactorEnabled),
    };

    for (const login of await this.store.getLogins(user.id)) {
      data[`${login.loginProvider} external login provider key`] = login.providerKey;
    }

    const key = await this.getAuthenticatorKey(user);
    if (key) data['Authenticator Key'] = key;

    return data;
  }
}
