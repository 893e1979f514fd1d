/**
 * backend/src/modules/accounts/dal/pg-credential-store.ts
 *
 * WHY:
 * - Postgres implementation of the CredentialStore port (Kysely + pg).
 * - Translates driver-level outcomes into the port's contract:
 *   - unique violation on accounts.username → { ok: false, reason: 'duplicate_username' }
 *   - anything else → CredentialStoreError (cause preserved for logs)
 *
 * RULES:
 * - No AppError (flows decide what the caller sees).
 * - Single INSERT per registration; no check-then-insert.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { ACCOUNTS_USERNAME_UNIQUE } from '../../../shared/db/schema';
import { isUniqueViolation } from '../../../shared/db/pg-errors';
import type { Account } from '../account.types';
import {
  CredentialStoreError,
  type CredentialStore,
  type SaveAccountParams,
  type SaveAccountResult,
} from '../credential-store';
import { getAccountByUsername, isUsernameTaken, toAccount } from '../queries/account.queries';
import { AccountRepo } from './account.repo';

export class PgCredentialStore implements CredentialStore {
  private readonly accountRepo: AccountRepo;

  constructor(private readonly db: DbExecutor) {
    this.accountRepo = new AccountRepo(db);
  }

  async saveAccount(params: SaveAccountParams): Promise<SaveAccountResult> {
    try {
      const row = await this.accountRepo.insertAccount(params);
      return { ok: true, account: toAccount(row) };
    } catch (err: unknown) {
      if (isUniqueViolation(err, ACCOUNTS_USERNAME_UNIQUE)) {
        return { ok: false, reason: 'duplicate_username' };
      }
      throw new CredentialStoreError('Failed to save account', { cause: err });
    }
  }

  async findAccount(username: string): Promise<Account | undefined> {
    try {
      return await getAccountByUsername(this.db, username);
    } catch (err: unknown) {
      throw new CredentialStoreError('Failed to load account', { cause: err });
    }
  }

  async isUsernameAvailable(username: string): Promise<boolean> {
    try {
      return !(await isUsernameTaken(this.db, username));
    } catch (err: unknown) {
      throw new CredentialStoreError('Failed to check username availability', { cause: err });
    }
  }
}
