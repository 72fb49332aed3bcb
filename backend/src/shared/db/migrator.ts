/**
 * backend/src/shared/db/migrator.ts
 *
 * WHY:
 * - One migration runner shared by startup, the development migrations endpoint,
 *   the database error page and the db:migrate CLI.
 *
 * RULES:
 * - Kysely's Migrator takes a database lock, so concurrent instances apply each
 *   migration once.
 * - Any failure is surfaced as MigrationError with the original cause.
 */

import { Migrator, type MigrationResult } from 'kysely';

import type { Db } from './db';
import { staticMigrationProvider } from './migrations';
import type { Logger } from '../logger/logger';

export type MigrationRunner = Pick<Migrator, 'migrateToLatest' | 'getMigrations'>;

export class MigrationError extends Error {
  readonly migrationName?: string;

  constructor(message: string, opts: { cause?: unknown; migrationName?: string } = {}) {
    super(message, { cause: opts.cause });
    this.name = 'MigrationError';
    this.migrationName = opts.migrationName;
  }
}

export function createMigrator(db: Db): Migrator {
  return new Migrator({ db, provider: staticMigrationProvider });
}

/**
 * Applies every pending migration in order.
 * Returns the names applied by this call (empty when already up to date).
 */
export async function applyMigrations(runner: MigrationRunner, logger: Logger): Promise<string[]> {
  const { error, results } = await runner.migrateToLatest();

  const applied: string[] = [];
  let failed: MigrationResult | undefined;

  for (const r of results ?? []) {
    if (r.status === 'Success') {
      applied.push(r.migrationName);
      logger.info('migrations.applied', { migration: r.migrationName });
    }
    if (r.status === 'Error') {
      failed = r;
      logger.error('migrations.failed', { migration: r.migrationName });
    }
  }

  if (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MigrationError(`Database migration failed: ${reason}`, {
      cause: error,
      migrationName: failed?.migrationName,
    });
  }

  return applied;
}

/** Names of migrations known to the provider but not yet executed. */
export async function listPendingMigrations(runner: MigrationRunner): Promise<string[]> {
  const infos = await runner.getMigrations();
  return infos.filter((m) => m.executedAt === undefined).map((m) => m.name);
}
