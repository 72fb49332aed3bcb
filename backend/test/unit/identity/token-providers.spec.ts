import { describe, it, expect } from 'vitest';

import { HmacSha256KeyedHasher } from '../../../src/shared/security/keyed-hasher';
import { TotpService } from '../../../src/shared/security/totp';
import { AuthenticatorTokenProvider } from '../../../src/modules/identity/tokens/authenticator-token-provider';
import { DataProtectorTokenProvider } from '../../../src/modules/identity/tokens/data-protector-token-provider';
import { TokenPurposes } from '../../../src/modules/identity/tokens/token-purposes';

const KEY = 'test-secret-test-secret-test-secret-0000';
const DAY_MS = 24 * 60 * 60 * 1000;

describe('DataProtectorTokenProvider', () => {
  let now = Date.parse('2026-01-01T00:00:00.000Z');
  const provider = new DataProtectorTokenProvider(new HmacSha256KeyedHasher(KEY), DAY_MS, () => now);
  const user = { id: 'user-1', securityStamp: 'STAMP-1' };

  it('validates a token for the same purpose, user and stamp', () => {
    const token = provider.generate(TokenPurposes.emailConfirmation, user);
    expect(provider.validate(TokenPurposes.emailConfirmation, token, user)).toBe(true);
  });

  it('rejects a token used for another purpose', () => {
    const token = provider.generate(TokenPurposes.emailConfirmation, user);
    expect(provider.validate(TokenPurposes.resetPassword, token, user)).toBe(false);
  });

  it('binds change-email tokens to the new address', () => {
    const token = provider.generate(TokenPurposes.changeEmail('new@example.com'), user);
    expect(provider.validate(TokenPurposes.changeEmail('new@example.com'), token, user)).toBe(true);
    expect(provider.validate(TokenPurposes.changeEmail('other@example.com'), token, user)).toBe(false);
  });

  it('rejects tokens once the security stamp changes', () => {
    const token = provider.generate(TokenPurposes.resetPassword, user);
    expect(provider.validate(TokenPurposes.resetPassword, token, { ...user, securityStamp: 'STAMP-2' })).toBe(false);
  });

  it('rejects tokens for a different user', () => {
    const token = provider.generate(TokenPurposes.resetPassword, user);
    expect(provider.validate(TokenPurposes.resetPassword, token, { ...user, id: 'user-2' })).toBe(false);
  });

  it('expires tokens after the lifespan', () => {
    const token = provider.generate(TokenPurposes.resetPassword, user);
    const issuedAt = now;
    try {
      now = issuedAt + DAY_MS;
      expect(provider.validate(TokenPurposes.resetPassword, token, user)).toBe(true);
      now = issuedAt + DAY_MS + 1;
      expect(provider.validate(TokenPurposes.resetPassword, token, user)).toBe(false);
    } finally {
      now = issuedAt;
    }
  });

  it('rejects tampered or malformed tokens', () => {
    const token = provider.generate(TokenPurposes.resetPassword, user);
    const [payload = '', signature = ''] = token.split('.');
    const forged = Buffer.from(
      JSON.stringify({ p: TokenPurposes.resetPassword, u: 'user-2', s: 'STAMP-1', t: now }),
    ).toString('base64url');

    expect(provider.validate(TokenPurposes.resetPassword, `${forged}.${signature}`, user)).toBe(false);
    expect(provider.validate(TokenPurposes.resetPassword, `${payload}.`, user)).toBe(false);
    expect(provider.validate(TokenPurposes.resetPassword, 'no-dot', user)).toBe(false);
  });

  it('rejects tokens signed with another key', () => {
    const other = new DataProtectorTokenProvider(
      new HmacSha256KeyedHasher('another-test-secret-another-test-secret'),
      DAY_MS,
      () => now,
    );
    const token = other.generate(TokenPurposes.resetPassword, user);
    expect(provider.validate(TokenPurposes.resetPassword, token, user)).toBe(false);
  });
});

describe('AuthenticatorTokenProvider', () => {
  const now = Date.parse('2026-01-01T00:00:00.000Z');
  const totp = new TotpService('IdentityStarter', () => now);
  const provider = new AuthenticatorTokenProvider(totp);

  it('accepts the current code, with spaces or dashes', () => {
    const key = provider.generateKey();
    const code = totp.generate(key);

    expect(provider.validate(code, key)).toBe(true);
    expect(provider.validate(`${code.slice(0, 3)} ${code.slice(3)}`, key)).toBe(true);
    expect(provider.validate(`${code.slice(0, 3)}-${code.slice(3)}`, key)).toBe(true);
  });

  it('rejects codes that are not six digits', () => {
    const key = provider.generateKey();
    expect(provider.validate('12345', key)).toBe(false);
    expect(provider.validate('abcdef', key)).toBe(false);
  });

  it('formats the key in lower-case groups of four', () => {
    expect(provider.formatKey('JBSWY3DPEHPK3PXP')).toBe('jbsw y3dp ehpk 3pxp');
    expect(provider.formatKey('JBSWY3')).toBe('jbsw y3');
  });

  it('builds an otpauth URI labelled with the email', () => {
    const uri = provider.authenticatorUri('JBSWY3DPEHPK3PXP', 'user@example.com');
    expect(uri.startsWith('otpauth://totp/IdentityStarter:user%40example.com?')).toBe(true);
    expect(uri).toContain('secret=JBSWY3DPEHPK3PXP');
    expect(uri).toContain('issuer=IdentityStarter');
  });
});
