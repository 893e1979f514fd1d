/**
 * backend/src/modules/accounts/dal/account.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for accounts (mutations).
 *
 * RULES:
 * - No transactions started here (flows own orchestration).
 * - No AppError.
 * - No policies.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { AccountRow } from './account.query-sql';

export class AccountRepo {
  constructor(private readonly db: DbExecutor) {}

  insertAccountQuery(params: {
    username: string;
    passwordHash: string;
    role: string;
    createdAt: Date;
  }) {
    return this.db
      .insertInto('accounts')
      .values({
        username: params.username,
        password_hash: params.passwordHash,
        role: params.role,
        created_at: params.createdAt,
      })
      .returning(['username', 'password_hash', 'role', 'created_at']);
  }

  /**
   * Creates a new account. Username must be unique (enforced by DB constraint
   * accounts_username_unique); a duplicate rejects with the driver's 23505 error.
   */
  async insertAccount(params: {
    username: string;
    passwordHash: string;
    role: string;
    createdAt: Date;
  }): Promise<Omit<AccountRow, 'id'>> {
    return this.insertAccountQuery(params).executeTakeFirstOrThrow();
  }
}
