/**
 * src/shared/session/session.store.ts
 *
 * WHY:
 * - Server-side session management through the Cache interface.
 * - Sessions are instantly revocable via destroy(); no signed-cookie revocation lists.
 * - TTL enforced by the cache (no expired session can be read).
 *
 * RULES:
 * - Depends only on Cache interface (DIP). Works with Redis in prod, InMemCache in tests.
 * - No HTTP concerns here (cookie handling lives in the cookie authentication handler).
 * - No business rules.
 */

import { randomUUID } from 'node:crypto';
import type { Cache } from '../cache/cache';
import { type SessionData, SessionDataSchema, SESSION_KEY_PREFIX } from './session.types';

export class SessionStore {
  constructor(private readonly cache: Cache) {}

  private key(sessionId: string): string {
    return `${SESSION_KEY_PREFIX}:${sessionId}`;
  }

  /**
   * Creates a new session and returns the session ID.
   * The caller is responsible for setting the cookie.
   */
  async create(data: SessionData, ttlSeconds: number): Promise<string> {
    const sessionId = randomUUID();

    await this.cache.set(this.key(sessionId), JSON.stringify(data), { ttlSeconds });

    return sessionId;
  }

  /**
   * Loads session data by ID. Returns null if expired, not found or unreadable.
   */
  async get(sessionId: string): Promise<SessionData | null> {
    const raw = await this.cache.get(this.key(sessionId));
    if (!raw) return null;

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      json = null;
    }

    const parsed = SessionDataSchema.safeParse(json);
    if (!parsed.success) {
      // Corrupted session: treat as missing
      await this.destroy(sessionId);
      return null;
    }
    return parsed.data;
  }

  async destroy(sessionId: string): Promise<void> {
    await this.cache.del(this.key(sessionId));
  }

  /**
   * Updates fields of an existing session in place.
   * Used by revalidation to bump `validatedAt`.
   *
   * RULES:
   * - Does NOT extend the session lifetime (keepTtl).
   * - No-op if the session does not exist (already expired or destroyed).
   */
  async update(sessionId: string, partial: Partial<SessionData>): Promise<void> {
    const existing = await this.get(sessionId);
    if (!existing) return;

    const updated: SessionData = { ...existing, ...partial };

    await this.cache.set(this.key(sessionId), JSON.stringify(updated), { keepTtl: true });
  }
}
