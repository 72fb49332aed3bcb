/**
 * src/modules/identity/dal/inmem-user-store.ts
 *
 * WHY:
 * - Lets unit and e2e tests run the full identity flows without Postgres.
 * - Enforces the same uniqueness and concurrency rules as the database.
 *
 * RULES:
 * - Stores copies; callers never hold a reference into the store.
 */

import type { IdentityUser, UserLoginInfo } from '../identity.types';
import type { CreateUserOutcome, UpdateUserOutcome, UserStore } from './user-store';

const tokenKey = (userId: string, loginProvider: string, name: string) =>
  `${userId}\u0000${loginProvider}\u0000${name}`;

export class InMemUserStore implements UserStore {
  private readonly users = new Map<string, IdentityUser>();
  private readonly tokens = new Map<string, string>();
  private readonly logins = new Map<string, UserLoginInfo[]>();

  private conflicts(user: IdentityUser): boolean {
    for (const other of this.users.values()) {
      if (other.id === user.id) continue;
      if (other.normalizedUserName === user.normalizedUserName) return true;
      if (other.normalizedEmail === user.normalizedEmail) return true;
    }
    return false;
  }

  create(user: IdentityUser): Promise<CreateUserOutcome> {
    if (this.users.has(user.id) || this.conflicts(user)) return Promise.resolve('duplicate');
    this.users.set(user.id, { ...user });
    return Promise.resolve('created');
  }

  update(user: IdentityUser, expectedConcurrencyStamp: string): Promise<UpdateUserOutcome> {
    const existing = this.users.get(user.id);
    if (!existing || existing.concurrencyStamp !== expectedConcurrencyStamp) {
      return Promise.resolve('concurrency_failure');
    }
    if (this.conflicts(user)) return Promise.resolve('duplicate');

    this.users.set(user.id, { ...user });
    return Promise.resolve('updated');
  }

  delete(userId: string): Promise<void> {
    this.users.delete(userId);
    this.logins.delete(userId);
    for (const key of [...this.tokens.keys()]) {
      if (key.startsWith(`${userId}\u0000`)) this.tokens.delete(key);
    }
    return Promise.resolve();
  }

  private findWhere(pred: (u: IdentityUser) => boolean): Promise<IdentityUser | null> {
    for (const u of this.users.values()) {
      if (pred(u)) return Promise.resolve({ ...u });
    }
    return Promise.resolve(null);
  }

  findById(userId: string): Promise<IdentityUser | null> {
    return this.findWhere((u) => u.id === userId);
  }

  findByNormalizedUserName(normalizedUserName: string): Promise<IdentityUser | null> {
    return this.findWhere((u) => u.normalizedUserName === normalizedUserName);
  }

  findByNormalizedEmail(normalizedEmail: string): Promise<IdentityUser | null> {
    return this.findWhere((u) => u.normalizedEmail === normalizedEmail);
  }

  getToken(userId: string, loginProvider: string, name: string): Promise<string | null> {
    return Promise.resolve(this.tokens.get(tokenKey(userId, loginProvider, name)) ?? null);
  }

  setToken(userId: string, loginProvider: string, name: string, value: string): Promise<void> {
    this.tokens.set(tokenKey(userId, loginProvider, name), value);
    return Promise.resolve();
  }

  removeToken(userId: string, loginProvider: string, name: string): Promise<void> {
    this.tokens.delete(tokenKey(userId, loginProvider, name));
    return Promise.resolve();
  }

  getLogins(userId: string): Promise<UserLoginInfo[]> {
    return Promise.resolve([...(this.logins.get(userId) ?? [])]);
  }

  /** Test helper: attach an external login record. */
  addLogin(userId: string, login: UserLoginInfo): void {
    this.logins.set(userId, [...(this.logins.get(userId) ?? []), login]);
  }
}
