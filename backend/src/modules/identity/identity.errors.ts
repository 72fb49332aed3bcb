/**
 * src/modules/identity/identity.errors.ts
 *
 * WHY:
 * - Identity module owns its domain-specific error semantics.
 * - identityError() builds the IdentityError entries inside IdentityResult
 *   (returned, not thrown). IdentityErrors holds the HTTP-facing AppError factories.
 * - Security-safe: login errors never reveal whether an email exists or is unconfirmed.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include passwords, tokens, codes or hashes in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';
import type { IdentityError, IdentityErrorCode } from './identity.types';

const DESCRIPTIONS: Record<IdentityErrorCode, (arg?: string | number) => string> = {
  DefaultError: () => 'An unknown failure has occurred.',
  ConcurrencyFailure: () => 'Optimistic concurrency failure, object has been modified.',
  DuplicateUserName: (name) => `Username '${name}' is already taken.`,
  DuplicateEmail: (email) => `Email '${email}' is already taken.`,
  InvalidUserName: (name) => `Username '${name}' is invalid, can only contain letters or digits.`,
  InvalidEmail: (email) => `Email '${email}' is invalid.`,
  InvalidToken: () => 'Invalid token.',
  PasswordMismatch: () => 'Incorrect password.',
  PasswordTooShort: (n) => `Passwords must be at least ${n} characters.`,
  PasswordRequiresDigit: () => "Passwords must have at least one digit ('0'-'9').",
  PasswordRequiresLower: () => "Passwords must have at least one lowercase ('a'-'z').",
  PasswordRequiresUpper: () => "Passwords must have at least one uppercase ('A'-'Z').",
  PasswordRequiresNonAlphanumeric: () => 'Passwords must have at least one non alphanumeric character.',
  PasswordRequiresUniqueChars: (n) => `Passwords must use at least ${n} different characters.`,
  RecoveryCodeRedemptionFailed: () => 'Recovery code redemption failed.',
};

export function identityError(code: IdentityErrorCode, arg?: string | number): IdentityError {
  return { code, description: DESCRIPTIONS[code](arg) };
}

export const IdentityErrors = {
  /** IdentityResult failure surfaced to the client (validation-style, 400). */
  failed(errors: IdentityError[], meta?: AppErrorMeta) {
    return new AppError({
      code: 'IDENTITY_ERROR',
      message: errors.map((e) => e.description).join(' '),
      meta: { ...meta, codes: errors.map((e) => e.code) },
    });
  },

  /** Login: wrong email/password, unknown user, or unconfirmed account. Intentionally vague. */
  invalidLoginAttempt(meta?: AppErrorMeta) {
    return AppError.unauthorized('Invalid login attempt.', meta);
  },

  invalidAuthenticatorCode(meta?: AppErrorMeta) {
    return AppError.unauthorized('Invalid authenticator code.', meta);
  },

  invalidRecoveryCode(meta?: AppErrorMeta) {
    return AppError.unauthorized('Invalid recovery code entered.', meta);
  },

  lockedOut(meta?: AppErrorMeta) {
    return new AppError({
      code: 'LOCKED_OUT',
      message: 'This account has been locked out, please try again later.',
      meta,
    });
  },

  /** No pending two-factor sign-in (TwoFactorUserId cookie missing or expired). */
  twoFactorUserNotFound(meta?: AppErrorMeta) {
    return AppError.unauthorized('Unable to load two-factor authentication user.', meta);
  },

  userNotLoaded(userId: string) {
    return AppError.notFound(`Unable to load user with ID '${userId}'.`, { userId });
  },

  emailConfirmationFailed(meta?: AppErrorMeta) {
    return new AppError({
      code: 'IDENTITY_ERROR',
      message: 'Error confirming your email.',
      meta,
    });
  },

  emailChangeFailed(meta?: AppErrorMeta) {
    return new AppError({
      code: 'IDENTITY_ERROR',
      message: 'Error changing email.',
      meta,
    });
  },

  invalidVerificationCode(meta?: AppErrorMeta) {
    return AppError.validationError('Verification code is invalid.', meta);
  },

  twoFactorNotEnabled(meta?: AppErrorMeta) {
    return AppError.validationError(
      'Cannot generate recovery codes for user because they do not have 2FA enabled.',
      meta,
    );
  },

  incorrectPassword(meta?: AppErrorMeta) {
    return AppError.validationError('Incorrect password.', meta);
  },
} as const;
