/**
 * src/modules/identity/auth/identity-constants.ts
 *
 * WHY:
 * - Scheme names are shared between the authentication options, the cookie
 *   handlers and SignInManager; one definition keeps them from drifting.
 */

export const IdentitySchemes = {
  /** Signed-in user. */
  application: 'Identity.Application',
  /** Short-lived state from an external login provider. */
  external: 'Identity.External',
  /** Password verified, second factor pending. */
  twoFactorUserId: 'Identity.TwoFactorUserId',
} as const;

export type IdentityScheme = (typeof IdentitySchemes)[keyof typeof IdentitySchemes];

export const IdentityCookieNames = {
  [IdentitySchemes.application]: 'identity.app',
  [IdentitySchemes.external]: 'identity.external',
  [IdentitySchemes.twoFactorUserId]: 'identity.2fa',
} as const satisfies Record<IdentityScheme, string>;

export const STATUS_MESSAGE_COOKIE = 'identity.status';

export const LOGIN_PATH = '/Account/Login';
