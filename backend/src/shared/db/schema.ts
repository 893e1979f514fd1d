/**
 * backend/src/shared/db/schema.ts
 *
 * WHY:
 * - Kysely needs a Database interface to type queries.
 * - Mirrors the tables created by ./migrations (snake_case, DB naming).
 *
 * RULES:
 * - Update together with a new migration.
 * - Domain code never sees these rows directly; queries shape them first.
 */

import type { ColumnType, Generated } from 'kysely';

export interface Accounts {
  id: Generated<string>;
  username: string;
  password_hash: string;
  // DB default 'USER'; immutable after insert
  role: ColumnType<string, string | undefined, never>;
  created_at: ColumnType<Date, Date | undefined, never>;
}

export interface DB {
  accounts: Accounts;
}

/** Name of the unique constraint on accounts.username (see 0001_accounts). */
export const ACCOUNTS_USERNAME_UNIQUE = 'accounts_username_unique';
