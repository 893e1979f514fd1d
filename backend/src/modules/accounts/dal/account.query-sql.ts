/**
 * backend/src/modules/accounts/dal/account.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for accounts (raw SQL access).
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - Usernames are compared exactly as given (no lower-casing, no trimming).
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { Accounts } from '../../../shared/db/schema';

export type AccountRow = Selectable<Accounts>;

export function selectAccountByUsernameQuery(db: DbExecutor, username: string) {
  return db
    .selectFrom('accounts')
    .select(['username', 'password_hash', 'role', 'created_at'])
    .where('username', '=', username);
}

export async function selectAccountByUsernameSql(
  db: DbExecutor,
  username: string,
): Promise<Omit<AccountRow, 'id'> | undefined> {
  return selectAccountByUsernameQuery(db, username).executeTakeFirst();
}

export function selectUsernameTakenQuery(db: DbExecutor, username: string) {
  return db.selectFrom('accounts').select('id').where('username', '=', username).limit(1);
}

export async function selectUsernameTakenSql(db: DbExecutor, username: string): Promise<boolean> {
  const row = await selectUsernameTakenQuery(db, username).executeTakeFirst();
  return row !== undefined;
}
