/**
 * src/modules/identity/identity.options.ts
 *
 * WHY:
 * - One options object drives the password policy, lockout, sign-in gating and
 *   token lifetimes. Defaults match a typical starter; registration overrides
 *   signIn.requireConfirmedAccount = true.
 */

export type PasswordOptions = {
  requiredLength: number;
  requiredUniqueChars: number;
  requireDigit: boolean;
  requireLowercase: boolean;
  requireUppercase: boolean;
  requireNonAlphanumeric: boolean;
};

export type LockoutOptions = {
  allowedForNewUsers: boolean;
  maxFailedAccessAttempts: number;
  defaultLockoutTimeSpanMs: number;
};

export type SignInOptions = {
  requireConfirmedAccount: boolean;
  requireConfirmedEmail: boolean;
  requireConfirmedPhoneNumber: boolean;
};

export type UserOptions = {
  allowedUserNameCharacters: string;
  requireUniqueEmail: boolean;
};

export type TokenOptions = {
  dataProtectionTokenLifespanMs: number;
  recoveryCodeCount: number;
};

export type IdentityOptions = {
  password: PasswordOptions;
  lockout: LockoutOptions;
  signIn: SignInOptions;
  user: UserOptions;
  tokens: TokenOptions;
};

export type IdentityOptionsOverrides = {
  [K in keyof IdentityOptions]?: Partial<IdentityOptions[K]>;
};

export function createIdentityOptions(overrides: IdentityOptionsOverrides = {}): IdentityOptions {
  return {
    password: {
      requiredLength: 6,
      requiredUniqueChars: 1,
      requireDigit: true,
      requireLowercase: true,
      requireUppercase: true,
      requireNonAlphanumeric: true,
      ...overrides.password,
    },
    lockout: {
      allowedForNewUsers: true,
      maxFailedAccessAttempts: 5,
      defaultLockoutTimeSpanMs: 5 * 60 * 1000,
      ...overrides.lockout,
    },
    signIn: {
      requireConfirmedAccount: false,
      requireConfirmedEmail: false,
      requireConfirmedPhoneNumber: false,
      ...overrides.signIn,
    },
    user: {
      allowedUserNameCharacters:
        'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789-._@+',
      requireUniqueEmail: true,
      ...overrides.user,
    },
    tokens: {
      dataProtectionTokenLifespanMs: 24 * 60 * 60 * 1000,
      recoveryCodeCount: 10,
      ...overrides.tokens,
    },
  };
}
