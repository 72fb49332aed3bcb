/**
 * src/shared/security/totp.ts
 *
 * WHY:
 * - Thin wrapper over the otpauth library (RFC 6238 TOTP).
 * - Keeps the TOTP implementation detail isolated so the authenticator token
 *   provider never touches otpauth directly.
 *
 * RULES:
 * - No business logic here.
 * - No DB access.
 * - Secrets are base32 strings.
 *
 * WINDOW:
 * - ±1 step tolerance = 90-second window (prev, current, next 30s slot).
 */

import * as OTPAuth from 'otpauth';

export class TotpService {
  private readonly ALGORITHM = 'SHA1';
  private readonly DIGITS = 6;
  private readonly PERIOD = 30;
  private readonly WINDOW = 1; // ±1 step tolerance

  constructor(
    private readonly issuer: string,
    private readonly now: () => number = Date.now,
  ) {}

  private totp(secret: string, label?: string): OTPAuth.TOTP {
    return new OTPAuth.TOTP({
      issuer: this.issuer,
      label,
      algorithm: this.ALGORITHM,
      digits: this.DIGITS,
      period: this.PERIOD,
      secret: OTPAuth.Secret.fromBase32(secret),
    });
  }

  /** Returns a new random 160-bit secret, base32-encoded. */
  generateSecret(): string {
    return new OTPAuth.Secret({ size: 20 }).base32;
  }

  /**
   * Builds the otpauth:// URI scanned by authenticator apps.
   *
   * @param label - shown in the authenticator app (the user's email)
   */
  buildUri(secret: string, label: string): string {
    return this.totp(secret, label).toString();
  }

  verify(secret: string, code: string): boolean {
    const delta = this.totp(secret).validate({
      token: code,
      timestamp: this.now(),
      window: this.WINDOW,
    });
    return delta !== null;
  }

  /** Current code for a secret. Used by tests to play the authenticator app. */
  generate(secret: string): string {
    return this.totp(secret).generate({ timestamp: this.now() });
  }
}
