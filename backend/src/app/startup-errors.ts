/**
 * backend/src/app/startup-errors.ts
 *
 * WHY:
 * - Startup failures are not HTTP errors (no AppError, no status code).
 *   They abort the process; src/index.ts logs them as server.fatal_startup_error.
 *
 * RULES:
 * - Messages never include passwords or full connection strings.
 * - MigrationError lives beside the migrator (shared/db/migrator.ts).
 */

/** Required configuration is missing or a settings file is unreadable. */
export class ConfigurationError extends Error {
  constructor(message: string, opts: { cause?: unknown } = {}) {
    super(message, { cause: opts.cause });
    this.name = 'ConfigurationError';
  }
}

/** A DATABASE_URL_POSTGRESQL value or key-value connection string is malformed. */
export class ConnectionStringError extends Error {
  constructor(message: string, opts: { cause?: unknown } = {}) {
    super(message, { cause: opts.cause });
    this.name = 'ConnectionStringError';
  }
}
