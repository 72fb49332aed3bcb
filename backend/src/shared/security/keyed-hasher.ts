/**
 * src/shared/security/keyed-hasher.ts
 *
 * WHY:
 * - Two-factor recovery codes are short (10 chars from a 26-symbol alphabet), so
 *   a leaked user_tokens table must not be enough to recover them offline.
 *   HMAC-SHA256(code, TOKEN_SIGNING_KEY) adds a server-side pepper.
 * - Data-protection tokens and antiforgery request tokens are signed with the
 *   same primitive (sign + verify).
 *
 * KEY:
 * - TOKEN_SIGNING_KEY from environment (min 32 chars, validated at startup).
 *
 * RULES:
 * - Deterministic: same (input, key) -> same output.
 * - verify() compares in constant time.
 * - No DB access. No business logic.
 */

import { createHmac, timingSafeEqual } from 'node:crypto';

export interface KeyedHasher {
  hash(value: string): string;
  verify(value: string, expectedHash: string): boolean;
}

export class HmacSha256KeyedHasher implements KeyedHasher {
  private readonly key: string;

  constructor(key: string) {
    if (key.length < 32) {
      throw new Error(
        `HmacSha256KeyedHasher: key must be at least 32 characters. Got ${key.length}.`,
      );
    }
    this.key = key;
  }

  /**
   * Returns HMAC-SHA256(value, key) as a lowercase hex string.
   */
  hash(value: string): string {
    return createHmac('sha256', this.key).update(value).digest('hex');
  }

  verify(value: string, expectedHash: string): boolean {
    const actual = Buffer.from(this.hash(value), 'utf8');
    const expected = Buffer.from(expectedHash, 'utf8');
    if (actual.length !== expected.length) return false;
    return timingSafeEqual(actual, expected);
  }
}
