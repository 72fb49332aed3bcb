/**
 * src/shared/db/migrations/index.ts
 *
 * WHY:
 * - The server runs from TypeScript sources under tsx and from tests; a static
 *   import list works in both without scanning a directory at runtime.
 *
 * RULES:
 * - Names sort in apply order. Append new migrations at the end.
 */

import type { Migration, MigrationProvider } from 'kysely';

import * as m0001 from './0001_identity_schema';

export const migrations: Record<string, Migration> = {
  '0001_identity_schema': m0001,
};

export const staticMigrationProvider: MigrationProvider = {
  getMigrations: () => Promise.resolve(migrations),
};
