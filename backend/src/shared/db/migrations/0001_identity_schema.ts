/**
 * src/shared/db/migrations/0001_identity_schema.ts
 *
 * WHY:
 * - Identity store: users, roles and the claim/login/token side tables.
 *
 * KEY CONSTRAINTS:
 * - normalized_user_name and normalized_email are the lookup keys (upper-cased).
 *   User names are unique; emails are unique among users too (registration uses
 *   the email as the user name).
 * - user_tokens: one value per (user, provider, name). Authenticator key and
 *   recovery codes live here.
 * - Every side table cascades on user/role delete.
 *
 * HOW TO RUN:
 *   npm run db:migrate
 *   (or start the server; MIGRATE_ON_STARTUP defaults to true)
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<any>): Promise<void> {
  // ---- users ----
  await db.schema
    .createTable('users')
    .addColumn('id', 'uuid', (col) => col.primaryKey())
    .addColumn('user_name', 'varchar(256)', (col) => col.notNull())
    .addColumn('normalized_user_name', 'varchar(256)', (col) => col.notNull().unique())
    .addColumn('email', 'varchar(256)', (col) => col.notNull())
    .addColumn('normalized_email', 'varchar(256)', (col) => col.notNull())
    .addColumn('email_confirmed', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('password_hash', 'text')
    .addColumn('security_stamp', 'text', (col) => col.notNull())
    .addColumn('concurrency_stamp', 'text', (col) => col.notNull())
    .addColumn('phone_number', 'text')
    .addColumn('phone_number_confirmed', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('two_factor_enabled', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('lockout_end', 'timestamptz')
    .addColumn('lockout_enabled', 'boolean', (col) => col.notNull().defaultTo(true))
    .addColumn('access_failed_count', 'integer', (col) => col.notNull().defaultTo(0))
    .execute();

  await sql`CREATE UNIQUE INDEX users_normalized_email_idx ON users(normalized_email);`.execute(db);

  // ---- roles ----
  await db.schema
    .createTable('roles')
    .addColumn('id', 'uuid', (col) => col.primaryKey())
    .addColumn('name', 'varchar(256)', (col) => col.notNull())
    .addColumn('normalized_name', 'varchar(256)', (col) => col.notNull().unique())
    .addColumn('concurrency_stamp', 'text', (col) => col.notNull())
    .execute();

  await db.schema
    .createTable('role_claims')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('role_id', 'uuid', (col) => col.notNull().references('roles.id').onDelete('cascade'))
    .addColumn('claim_type', 'text', (col) => col.notNull())
    .addColumn('claim_value', 'text')
    .execute();

  await sql`CREATE INDEX role_claims_role_id_idx ON role_claims(role_id);`.execute(db);

  // ---- user side tables ----
  await db.schema
    .createTable('user_roles')
    .addColumn('user_id', 'uuid', (col) => col.notNull().references('users.id').onDelete('cascade'))
    .addColumn('role_id', 'uuid', (col) => col.notNull().references('roles.id').onDelete('cascade'))
    .addPrimaryKeyConstraint('user_roles_pk', ['user_id', 'role_id'])
    .execute();

  await sql`CREATE INDEX user_roles_role_id_idx ON user_roles(role_id);`.execute(db);

  await db.schema
    .createTable('user_claims')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('user_id', 'uuid', (col) => col.notNull().references('users.id').onDelete('cascade'))
    .addColumn('claim_type', 'text', (col) => col.notNull())
    .addColumn('claim_value', 'text')
    .execute();

  await sql`CREATE INDEX user_claims_user_id_idx ON user_claims(user_id);`.execute(db);

  await db.schema
    .createTable('user_logins')
    .addColumn('login_provider', 'varchar(128)', (col) => col.notNull())
    .addColumn('provider_key', 'varchar(128)', (col) => col.notNull())
    .addColumn('provider_display_name', 'text')
    .addColumn('user_id', 'uuid', (col) => col.notNull().references('users.id').onDelete('cascade'))
    .addPrimaryKeyConstraint('user_logins_pk', ['login_provider', 'provider_key'])
    .execute();

  await sql`CREATE INDEX user_logins_user_id_idx ON user_logins(user_id);`.execute(db);

  await db.schema
    .createTable('user_tokens')
    .addColumn('user_id', 'uuid', (col) => col.notNull().references('users.id').onDelete('cascade'))
    .addColumn('login_provider', 'varchar(128)', (col) => col.notNull())
    .addColumn('name', 'varchar(128)', (col) => col.notNull())
    .addColumn('value', 'text')
    .addPrimaryKeyConstraint('user_tokens_pk', ['user_id', 'login_provider', 'name'])
    .execute();
}

export async function down(db: Kysely<any>): Promise<void> {
  await db.schema.dropTable('user_tokens').ifExists().execute();
  await db.schema.dropTable('user_logins').ifExists().execute();
  await db.schema.dropTable('user_claims').ifExists().execute();
  await db.schema.dropTable('user_roles').ifExists().execute();
  await db.schema.dropTable('role_claims').ifExists().execute();
  await db.schema.dropTable('roles').ifExists().execute();
  await db.schema.dropTable('users').ifExists().execute();
}
