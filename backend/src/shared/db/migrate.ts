/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - Apply migrations without starting the server (CI, one-off release step).
 * - Resolves the connection string exactly like startup does.
 *
 * HOW TO USE:
 * - npm run db:migrate
 */

import 'dotenv/config';

import { buildConfig } from '../../app/config';
import { loadAppSettings } from '../../app/app-settings';
import { parseConnectionString, resolveConnectionString, toPoolConfig } from '../../app/connection-string';
import { createDb } from './db';
import { applyMigrations, createMigrator } from './migrator';
import { logger } from '../logger/logger';

async function runMigrations(): Promise<void> {
  const config = buildConfig();
  const appSettings = loadAppSettings(config.environment);
  const { connectionString, source } = resolveConnectionString({
    databaseUrl: config.databaseUrl,
    appSettings,
  });

  logger.info('migrations.cli_start', { connectionSource: source });

  const db = createDb(toPoolConfig(parseConnectionString(connectionString)));
  try {
    const applied = await applyMigrations(createMigrator(db), logger);
    logger.info('migrations.up_to_date', { applied: applied.length });
  } finally {
    await db.destroy();
  }
}

runMigrations().catch((err: unknown) => {
  logger.error('migrations.cli_failed', { err });
  process.exit(1);
});
