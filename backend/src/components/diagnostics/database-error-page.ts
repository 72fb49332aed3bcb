/**
 * backend/src/components/diagnostics/database-error-page.ts
 *
 * WHY:
 * - The most common first-run failure is a database without the identity schema.
 *   In Development, database errors show which migrations are pending and offer
 *   a button that posts to POST /ApplyDatabaseMigrations.
 *
 * RULES:
 * - Development only (registered in step 7 of service registration).
 * - Listing pending migrations needs the database too; when that fails the page
 *   still renders, without the list.
 */

import type { FastifyRequest } from 'fastify';

import { isDatabaseError } from '../../shared/db/db';
import { listPendingMigrations, type MigrationRunner } from '../../shared/db/migrator';
import type { Logger } from '../../shared/logger/logger';
import { escapeHtml } from '../html';

export const APPLY_MIGRATIONS_PATH = '/ApplyDatabaseMigrations';

export class DatabaseErrorPage {
  constructor(
    private readonly migrator: MigrationRunner,
    private readonly logger: Logger,
  ) {}

  matches(err: unknown): boolean {
    return isDatabaseError(err);
  }

  async render(err: Error, req: FastifyRequest): Promise<string> {
    const pending = await this.pendingMigrations();

    let migrations: string;
    if (pending === null) {
      migrations = '<p>Pending migrations could not be listed (the database is not reachable).</p>';
    } else if (pending.length === 0) {
      migrations = '<p>All migrations have been applied.</p>';
    } else {
      migrations = `<p>There are pending migrations for the identity schema:</p>
  <ul>${pending.map((m) => `<li><code>${escapeHtml(m)}</code></li>`).join('')}</ul>
  <form method="post" action="${APPLY_MIGRATIONS_PATH}">
    <button type="submit">Apply Migrations</button>
  </form>
  <p>Alternatively, apply them from the command line: <code>npm run db:migrate</code></p>`;
    }

    return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <title>Database Error</title>
  <link rel="stylesheet" href="/app.css">
</head>
<body class="diagnostics">
  <h1>A database operation failed while processing the request.</h1>
  <h2>${escapeHtml(err.name)}: ${escapeHtml(err.message)}</h2>
  <p><code>${escapeHtml(req.method)} ${escapeHtml(req.url)}</code></p>
  ${migrations}
</body>
</html>`;
  }

  private async pendingMigrations(): Promise<string[] | null> {
    try {
      return await listPendingMigrations(this.migrator);
    } catch (err) {
      this.logger.warn('database_error_page.pending_unavailable', {
        message: err instanceof Error ? err.message : String(err),
      });
      return null;
    }
  }
}
