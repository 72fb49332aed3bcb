/**
 * backend/src/shared/cache/redis-cache.ts
 *
 * WHY:
 * - Redis implementation of Cache so cookie sessions survive restarts and are
 *   shared between instances.
 *
 * IMPORTANT:
 * - In monorepos, importing RedisClientType can cause type conflicts if multiple copies of
 *   @redis/client exist. We avoid that by deriving the client type from createClient().
 * - Service registration is synchronous, so the connection is opened lazily on the
 *   first command and shared by every caller after that.
 *
 * LOGGING:
 * - Redis connection errors fire outside any request context (they are client-level events,
 *   not request-level). We use the global logger directly; withRequestContext() is not
 *   applicable here.
 */

import { createClient } from 'redis';
import type { Cache, CacheSetOptions } from './cache';
import { logger } from '../logger/logger';

type RedisClient = ReturnType<typeof createClient>;

export class RedisCache implements Cache {
  private readonly client: RedisClient;
  private connecting: Promise<unknown> | null = null;

  constructor(redisUrl: string) {
    this.client = createClient({ url: redisUrl });

    this.client.on('error', (err: Error) => {
      // Connection-level error: no request context available.
      logger.error('redis.client_error', {
        flow: 'redis',
        message: err.message,
        stack: err.stack,
      });
    });
  }

  private async ready(): Promise<RedisClient> {
    if (!this.client.isOpen) {
      this.connecting ??= this.client.connect();
      await this.connecting;
    }
    return this.client;
  }

  async close(): Promise<void> {
    if (this.client.isOpen) {
      await this.client.quit();
    }
    this.connecting = null;
  }

  async get(key: string): Promise<string | null> {
    const client = await this.ready();
    return client.get(key);
  }

  async set(key: string, value: string, opts?: CacheSetOptions): Promise<void> {
    const client = await this.ready();

    if (opts?.keepTtl) {
      await client.set(key, value, { KEEPTTL: true });
      return;
    }
    if (opts?.ttlSeconds) {
      await client.set(key, value, { EX: opts.ttlSeconds });
      return;
    }
    await client.set(key, value);
  }

  async del(key: string): Promise<void> {
    const client = await this.ready();
    await client.del(key);
  }
}
