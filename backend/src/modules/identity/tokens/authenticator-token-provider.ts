/**
 * src/modules/identity/tokens/authenticator-token-provider.ts
 *
 * WHY:
 * - Two-factor codes come from an authenticator app (TOTP). This provider turns
 *   the stored key into what the UI shows (shared key + otpauth URI) and checks codes.
 *
 * RULES:
 * - The key is a base32 secret stored in user_tokens (AuthenticatorKey).
 * - Codes may be typed with spaces or dashes; they are stripped before checking.
 */

import type { TotpService } from '../../../shared/security/totp';

export class AuthenticatorTokenProvider {
  constructor(private readonly totp: TotpService) {}

  generateKey(): string {
    return this.totp.generateSecret();
  }

  validate(code: string, key: string): boolean {
    const normalized = code.replace(/[\s-]/g, '');
    if (!/^\d{6}$/.test(normalized)) return false;
    return this.totp.verify(key, normalized);
  }

  /** otpauth:// URI for QR codes; the label is the user's email. */
  authenticatorUri(key: string, email: string): string {
    return this.totp.buildUri(key, email);
  }

  /** "JBSWY3DPEHPK3PXP" -> "jbsw y3dp ehpk 3pxp" (easier to type by hand). */
  formatKey(key: string): string {
    return (key.toLowerCase().match(/.{1,4}/g) ?? []).join(' ');
  }
}
