/**
 * src/modules/identity/dal/kysely-user-store.ts
 *
 * WHY:
 * - Postgres implementation of UserStore (users, user_tokens, user_logins).
 *
 * RULES:
 * - No transactions started here.
 * - Unique violations (23505) are reported as 'duplicate', not thrown.
 * - Row <-> record mapping lives here only.
 */

import type { Selectable } from 'kysely';
import pg from 'pg';

import type { DbExecutor } from '../../../shared/db/db';
import type { UsersTable } from '../../../shared/db/schema';
import type { IdentityUser, UserLoginInfo } from '../identity.types';
import type { CreateUserOutcome, UpdateUserOutcome, UserStore } from './user-store';

type UserRow = Selectable<UsersTable>;

const UNIQUE_VIOLATION = '23505';

function isUniqueViolation(err: unknown): boolean {
  return err instanceof pg.DatabaseError && err.code === UNIQUE_VIOLATION;
}

function toUser(row: UserRow): IdentityUser {
  return {
    id: row.id,
    userName: row.user_name,
    normalizedUserName: row.normalized_user_name,
    email: row.email,
    normalizedEmail: row.normalized_email,
    emailConfirmed: row.email_confirmed,
    passwordHash: row.password_hash,
    securityStamp: row.security_stamp,
    concurrencyStamp: row.concurrency_stamp,
    phoneNumber: row.phone_number,
    phoneNumberConfirmed: row.phone_number_confirmed,
    twoFactorEnabled: row.two_factor_enabled,
    lockoutEnd: row.lockout_end,
    lockoutEnabled: row.lockout_enabled,
    accessFailedCount: row.access_failed_count,
  };
}

function toRow(user: IdentityUser): UserRow {
  return {
    id: user.id,
    user_name: user.userName,
    normalized_user_name: user.normalizedUserName,
    email: user.email,
    normalized_email: user.normalizedEmail,
    email_confirmed: user.emailConfirmed,
    password_hash: user.passwordHash,
    security_stamp: user.securityStamp,
    concurrency_stamp: user.concurrencyStamp,
    phone_number: user.phoneNumber,
    phone_number_confirmed: user.phoneNumberConfirmed,
    two_factor_enabled: user.twoFactorEnabled,
    lockout_end: user.lockoutEnd,
    lockout_enabled: user.lockoutEnabled,
    access_failed_count: user.accessFailedCount,
  };
}

export class KyselyUserStore implements UserStore {
  constructor(private readonly db: DbExecutor) {}

  async create(user: IdentityUser): Promise<CreateUserOutcome> {
    try {
      await this.db.insertInto('users').values(toRow(user)).execute();
      return 'created';
    } catch (err) {
      if (isUniqueViolation(err)) return 'duplicate';
      throw err;
    }
  }

  async update(user: IdentityUser, expectedConcurrencyStamp: string): Promise<UpdateUserOutcome> {
    const { id, ...changes } = toRow(user);
    try {
      const res = await this.db
        .updateTable('users')
        .set(changes)
        .where('id', '=', id)
        .where('concurrency_stamp', '=', expectedConcurrencyStamp)
        .executeTakeFirst();

      return res.numUpdatedRows > 0n ? 'updated' : 'concurrency_failure';
    } catch (err) {
      if (isUniqueViolation(err)) return 'duplicate';
      throw err;
    }
  }

  async delete(userId: string): Promise<void> {
    // Side tables cascade.
    await this.db.deleteFrom('users').where('id', '=', userId).execute();
  }

  async findById(userId: string): Promise<IdentityUser | null> {
    const row = await this.db.selectFrom('users').selectAll().where('id', '=', userId).executeTakeFirst();
    return row ? toUser(row) : null;
  }

  async findByNormalizedUserName(normalizedUserName: string): Promise<IdentityUser | null> {
    const row = await this.db
      .selectFrom('users')
      .selectAll()
      .where('normalized_user_name', '=', normalizedUserName)
      .executeTakeFirst();
    return row ? toUser(row) : null;
  }

  async findByNormalizedEmail(normalizedEmail: string): Promise<IdentityUser | null> {
    const row = await this.db
      .selectFrom('users')
      .selectAll()
      .where('normalized_email', '=', normalizedEmail)
      .executeTakeFirst();
    return row ? toUser(row) : null;
  }

  async getToken(userId: string, loginProvider: string, name: string): Promise<string | null> {
    const row = await this.db
      .selectFrom('user_tokens')
      .select('value')
      .where('user_id', '=', userId)
      .where('login_provider', '=', loginProvider)
      .where('name', '=', name)
      .executeTakeFirst();
    return row?.value ?? null;
  }

  async setToken(userId: string, loginProvider: string, name: string, value: string): Promise<void> {
    await this.db
      .insertInto('user_tokens')
      .values({ user_id: userId, login_provider: loginProvider, name, value })
      .onConflict((oc) => oc.columns(['user_id', 'login_provider', 'name']).doUpdateSet({ value }))
      .execute();
  }

  async removeToken(userId: string, loginProvider: string, name: string): Promise<void> {
    await this.db
      .deleteFrom('user_tokens')
      .where('user_id', '=', userId)
      .where('login_provider', '=', loginProvider)
      .where('name', '=', name)
      .execute();
  }

  async getLogins(userId: string): Promise<UserLoginInfo[]> {
    const rows = await this.db
      .selectFrom('user_logins')
      .select(['login_provider', 'provider_key', 'provider_display_name'])
      .where('user_id', '=', userId)
      .orderBy('login_provider')
      .execute();

    return rows.map((r) => ({
      loginProvider: r.login_provider,
      providerKey: r.provider_key,
      providerDisplayName: r.provider_display_name,
    }));
  }
}
