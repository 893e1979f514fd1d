/**
 * backend/src/modules/accounts/queries/account.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They shape DB rows into Account domain types.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { selectAccountByUsernameSql, selectUsernameTakenSql } from '../dal/account.query-sql';
import type { AccountRow } from '../dal/account.query-sql';
import type { Account } from '../account.types';

export function toAccount(row: Omit<AccountRow, 'id'>): Account {
  return {
    username: row.username,
    passwordHash: row.password_hash,
    role: row.role,
    createdAt: row.created_at,
  };
}

export async function getAccountByUsername(
  db: DbExecutor,
  username: string,
): Promise<Account | undefined> {
  const row = await selectAccountByUsernameSql(db, username);
  if (!row) return undefined;
  return toAccount(row);
}

export async function isUsernameTaken(db: DbExecutor, username: string): Promise<boolean> {
  return selectUsernameTakenSql(db, username);
}
