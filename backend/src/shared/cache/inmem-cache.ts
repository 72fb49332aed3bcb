/**
 * src/shared/cache/inmem-cache.ts
 *
 * WHY:
 * - Allows tests (and local dev without REDIS_URL) to run without external infra.
 *
 * HOW TO USE:
 * - const cache = new InMemCache()
 * - const cache = new InMemCache(() => fakeNow)  // tests that move the clock
 */

import type { Cache, CacheSetOptions } from './cache';

type StringEntry = { value: string; expiresAtMs: number | null };

export class InMemCache implements Cache {
  private readonly store = new Map<string, StringEntry>();

  constructor(private readonly now: () => number = Date.now) {}

  private getEntry(key: string): StringEntry | null {
    const entry = this.store.get(key);
    if (!entry) return null;

    if (entry.expiresAtMs !== null && entry.expiresAtMs <= this.now()) {
      this.store.delete(key);
      return null;
    }

    return entry;
  }

  get(key: string): Promise<string | null> {
    const entry = this.getEntry(key);
    return Promise.resolve(entry ? entry.value : null);
  }

  set(key: string, value: string, opts?: CacheSetOptions): Promise<void> {
    let expiresAtMs: number | null = null;
    if (opts?.keepTtl) {
      expiresAtMs = this.getEntry(key)?.expiresAtMs ?? null;
    } else if (opts?.ttlSeconds) {
      expiresAtMs = this.now() + opts.ttlSeconds * 1000;
    }

    this.store.set(key, { value, expiresAtMs });
    return Promise.resolve();
  }

  del(key: string): Promise<void> {
    this.store.delete(key);
    return Promise.resolve();
  }

  close(): Promise<void> {
    this.store.clear();
    return Promise.resolve();
  }

  /** Number of live keys. Test helper. */
  size(): number {
    return [...this.store.keys()].filter((k) => this.getEntry(k) !== null).length;
  }
}
