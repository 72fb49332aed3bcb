/**
 * src/shared/session/session.types.ts
 *
 * WHY:
 * - Defines the server-side session data model shared by every cookie scheme.
 * - Sessions are stored in the Cache (Redis or in-memory) with a TTL.
 * - The cookie only carries an opaque session id.
 *
 * RULES:
 * - Session data must be JSON-serializable.
 * - Never store passwords or tokens in session data.
 * - securityStamp is a copy taken at sign-in; revalidation compares it to the
 *   stored user's current stamp.
 */

import { z } from 'zod';

export const SessionDataSchema = z.object({
  scheme: z.string().min(1),
  userId: z.string().min(1),
  userName: z.string(),
  securityStamp: z.string(),
  isPersistent: z.boolean(),
  issuedAt: z.string(), // ISO string (JSON-safe)
  validatedAt: z.string(),
});

export type SessionData = z.infer<typeof SessionDataSchema>;

/**
 * Session prefix in the cache. Full key: `session:{sessionId}`.
 * Keeps session keys isolated from other cache entries.
 */
export const SESSION_KEY_PREFIX = 'session';
