/**
 * backend/src/shared/db/db.ts
 *
 * WHY:
 * - Central place to create the Kysely DB connection.
 * - Table types live in ./schema (kept in step with the migrations).
 *
 * HOW TO USE:
 * - const db = createDb(toPoolConfig(parseConnectionString(connectionString)))
 * - pg.Pool connects lazily: creating the Db opens no socket.
 */

import pg, { type PoolConfig } from 'pg';
import { Kysely, PostgresDialect } from 'kysely';

import type { IdentityDatabase } from './schema';

export type Db = Kysely<IdentityDatabase>;

/**
 * DbExecutor is the only DB "capability" DAL code should accept.
 * - Works for both main DB and transactions.
 * - Prevents leaking concrete DB construction into modules.
 */
export type DbExecutor = Kysely<IdentityDatabase>;

export function createDb(poolConfig: PoolConfig): Db {
  const pool = new pg.Pool({
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
    ...poolConfig,
  });

  return new Kysely<IdentityDatabase>({
    dialect: new PostgresDialect({ pool }),
  });
}

/**
 * True for errors raised by the PostgreSQL client (server error responses and
 * connection failures). Used to pick the database error page in Development.
 */
export function isDatabaseError(err: unknown): boolean {
  if (err instanceof pg.DatabaseError) return true;
  if (!(err instanceof Error) || !('code' in err)) return false;
  return err.code === 'ECONNREFUSED' || err.code === 'ENOTFOUND' || err.code === 'ETIMEDOUT';
}
