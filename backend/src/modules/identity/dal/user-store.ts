/**
 * src/modules/identity/dal/user-store.ts
 *
 * WHY:
 * - UserManager depends on this interface, not on Kysely (DIP).
 * - KyselyUserStore runs against Postgres; InMemUserStore backs tests.
 *
 * RULES:
 * - No AppError. No policies. Results are plain values.
 * - update() is optimistic: it only writes when the stored concurrency stamp
 *   still equals expectedConcurrencyStamp.
 * - Lookups by name/email take the NORMALIZED value.
 */

import type { IdentityUser, UserLoginInfo } from '../identity.types';

export type CreateUserOutcome = 'created' | 'duplicate';
export type UpdateUserOutcome = 'updated' | 'concurrency_failure' | 'duplicate';

export interface UserStore {
  create(user: IdentityUser): Promise<CreateUserOutcome>;
  update(user: IdentityUser, expectedConcurrencyStamp: string): Promise<UpdateUserOutcome>;
  delete(userId: string): Promise<void>;

  findById(userId: string): Promise<IdentityUser | null>;
  findByNormalizedUserName(normalizedUserName: string): Promise<IdentityUser | null>;
  findByNormalizedEmail(normalizedEmail: string): Promise<IdentityUser | null>;

  getToken(userId: string, loginProvider: string, name: string): Promise<string | null>;
  setToken(userId: string, loginProvider: string, name: string, value: string): Promise<void>;
  removeToken(userId: string, loginProvider: string, name: string): Promise<void>;

  getLogins(userId: string): Promise<UserLoginInfo[]>;
}
