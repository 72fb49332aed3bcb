/**
 * src/modules/identity/identity.types.ts
 *
 * WHY:
 * - Domain types for the identity module (user record, results, sign-in outcomes).
 *
 * RULES:
 * - camelCase here; the DAL maps to and from snake_case columns.
 * - passwordHash, securityStamp and concurrencyStamp never leave the server.
 */

export type IdentityUser = {
  id: string;
  userName: string;
  normalizedUserName: string;
  email: string;
  normalizedEmail: string;
  emailConfirmed: boolean;
  passwordHash: string | null;
  /** Rotated on every credential change; sessions carrying an older stamp are revoked. */
  securityStamp: string;
  /** Rotated on every write; an update carrying an older stamp is rejected. */
  concurrencyStamp: string;
  phoneNumber: string | null;
  phoneNumberConfirmed: boolean;
  twoFactorEnabled: boolean;
  lockoutEnd: Date | null;
  lockoutEnabled: boolean;
  accessFailedCount: number;
};

export type UserLoginInfo = {
  loginProvider: string;
  providerKey: string;
  providerDisplayName: string | null;
};

export type IdentityErrorCode =
  | 'DefaultError'
  | 'ConcurrencyFailure'
  | 'DuplicateUserName'
  | 'DuplicateEmail'
  | 'InvalidUserName'
  | 'InvalidEmail'
  | 'InvalidToken'
  | 'PasswordMismatch'
  | 'PasswordTooShort'
  | 'PasswordRequiresDigit'
  | 'PasswordRequiresLower'
  | 'PasswordRequiresUpper'
  | 'PasswordRequiresNonAlphanumeric'
  | 'PasswordRequiresUniqueChars'
  | 'RecoveryCodeRedemptionFailed';

export type IdentityError = {
  code: IdentityErrorCode;
  description: string;
};

export type IdentityResult = { succeeded: true } | { succeeded: false; errors: IdentityError[] };

const success: IdentityResult = { succeeded: true };

export const IdentityResult = {
  success,

  failed(...errors: IdentityError[]): IdentityResult {
    return { succeeded: false, errors };
  },
} as const;

export type SignInResult = 'Succeeded' | 'RequiresTwoFactor' | 'LockedOut' | 'NotAllowed' | 'Failed';
