/**
 * src/shared/cache/cache.ts
 *
 * WHY:
 * - Cookie sessions live in a key/value cache with expiry: Redis when
 *   REDIS_URL is set, InMemCache otherwise and in tests.
 *
 * RULES:
 * - Values are strings; callers own serialization.
 * - A write either sets a new lifetime or keeps the current one, never both.
 *   Session revalidation rewrites the entry with `keepTtl` so checking a
 *   session never extends it.
 */

export type CacheSetOptions =
  | { ttlSeconds: number; keepTtl?: never }
  | { keepTtl: true; ttlSeconds?: never };

export interface Cache {
  get(key: string): Promise<string | null>;
  /** Without options the entry never expires. */
  set(key: string, value: string, opts?: CacheSetOptions): Promise<void>;
  del(key: string): Promise<void>;
  close(): Promise<void>;
}
