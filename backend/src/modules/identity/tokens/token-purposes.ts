/**
 * src/modules/identity/tokens/token-purposes.ts
 *
 * WHY:
 * - A token issued for one purpose must never validate for another.
 *   The change-email purpose embeds the new address, so a token for one
 *   address cannot confirm a different one.
 */

export const TokenPurposes = {
  emailConfirmation: 'EmailConfirmation',
  resetPassword: 'ResetPassword',
  changeEmail: (newEmail: string) => `ChangeEmail:${newEmail}`,
} as const;

/** user_tokens.login_provider for tokens the identity module owns. */
export const INTERNAL_LOGIN_PROVIDER = 'Identity';
export const AUTHENTICATOR_KEY_TOKEN = 'AuthenticatorKey';
export const RECOVERY_CODES_TOKEN = 'RecoveryCodes';
