/**
 * src/modules/identity/tokens/data-protector-token-provider.ts
 *
 * WHY:
 * - Email confirmation, password reset and change-email links carry a token
 *   that needs no database row: it is a signed payload bound to the user's
 *   current security stamp.
 *
 * FORMAT:
 * - base64url(JSON { p: purpose, u: userId, s: securityStamp, t: issuedAtMs }) + "." + hex HMAC
 *
 * RULES:
 * - Valid only for the same purpose, user and security stamp, within the lifespan.
 * - Rotating the security stamp (password change, reset, email change) invalidates
 *   every outstanding token for that user.
 * - Signature is checked before the payload is parsed.
 */

import { z } from 'zod';

import type { KeyedHasher } from '../../../shared/security/keyed-hasher';
import type { IdentityUser } from '../identity.types';

const PayloadSchema = z.object({
  p: z.string(),
  u: z.string(),
  s: z.string(),
  t: z.number(),
});

// Issued-at slightly in the future is tolerated (clock skew between instances).
const MAX_CLOCK_SKEW_MS = 5 * 60 * 1000;

export class DataProtectorTokenProvider {
  constructor(
    private readonly hasher: KeyedHasher,
    private readonly lifespanMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  generate(purpose: string, user: Pick<IdentityUser, 'id' | 'securityStamp'>): string {
    const payload = Buffer.from(
      JSON.stringify({ p: purpose, u: user.id, s: user.securityStamp, t: this.now() }),
      'utf8',
    ).toString('base64url');

    return `${payload}.${this.hasher.hash(payload)}`;
  }

  validate(purpose: string, token: string, user: Pick<IdentityUser, 'id' | 'securityStamp'>): boolean {
    const dot = token.lastIndexOf('.');
    if (dot <= 0) return false;

    const payload = token.slice(0, dot);
    const signature = token.slice(dot + 1);
    if (!this.hasher.verify(payload, signature)) return false;

    let json: unknown;
    try {
      json = JSON.parse(Buffer.from(payload, 'base64url').toString('utf8'));
    } catch {
      return false;
    }

    const parsed = PayloadSchema.safeParse(json);
    if (!parsed.success) return false;

    const { p, u, s, t } = parsed.data;
    const age = this.now() - t;

    return (
      p === purpose &&
      u === user.id &&
      s === user.securityStamp &&
      age <= this.lifespanMs &&
      age >= -MAX_CLOCK_SKEW_MS
    );
  }
}
