/**
 * backend/src/shared/db/schema.ts
 *
 * WHY:
 * - Kysely needs the table shapes to type queries.
 * - Mirrors migrations/0001_identity_schema.ts; a column added there is added here
 *   in the same change.
 *
 * RULES:
 * - snake_case column names (as stored).
 * - Mapping to camelCase domain records happens in the identity DAL, not here.
 */

import type { Generated } from 'kysely';

export interface UsersTable {
  id: string;
  user_name: string;
  normalized_user_name: string;
  email: string;
  normalized_email: string;
  email_confirmed: boolean;
  password_hash: string | null;
  security_stamp: string;
  concurrency_stamp: string;
  phone_number: string | null;
  phone_number_confirmed: boolean;
  two_factor_enabled: boolean;
  lockout_end: Date | null;
  lockout_enabled: boolean;
  access_failed_count: number;
}

export interface RolesTable {
  id: string;
  name: string;
  normalized_name: string;
  concurrency_stamp: string;
}

export interface UserRolesTable {
  user_id: string;
  role_id: string;
}

export interface UserClaimsTable {
  id: Generated<number>;
  user_id: string;
  claim_type: string;
  claim_value: string | null;
}

export interface UserLoginsTable {
  login_provider: string;
  provider_key: string;
  provider_display_name: string | null;
  user_id: string;
}

export interface UserTokensTable {
  user_id: string;
  login_provider: string;
  name: string;
  value: string | null;
}

export interface RoleClaimsTable {
  id: Generated<number>;
  role_id: string;
  claim_type: string;
  claim_value: string | null;
}

export interface IdentityDatabase {
  users: UsersTable;
  roles: RolesTable;
  user_roles: UserRolesTable;
  user_claims: UserClaimsTable;
  user_logins: UserLoginsTable;
  user_tokens: UserTokensTable;
  role_claims: RoleClaimsTable;
}
