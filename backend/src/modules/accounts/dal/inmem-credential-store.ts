/**
 * backend/src/modules/accounts/dal/inmem-credential-store.ts
 *
 * WHY:
 * - Allows tests (and local dev without Postgres) to run without external infra.
 * - Same contract as PgCredentialStore.
 *
 * HOW TO USE:
 * - const store = new InMemCredentialStore()
 *
 * ATOMICITY:
 * - saveAccount checks and inserts with no await in between, so two concurrent
 *   registrations for one username cannot both succeed.
 */

import type { Account } from '../account.types';
import type { CredentialStore, SaveAccountParams, SaveAccountResult } from '../credential-store';

export class InMemCredentialStore implements CredentialStore {
  private readonly accounts = new Map<string, Account>();

  saveAccount(params: SaveAccountParams): Promise<SaveAccountResult> {
    if (this.accounts.has(params.username)) {
      return Promise.resolve({ ok: false, reason: 'duplicate_username' });
    }

    const account: Account = {
      username: params.username,
      passwordHash: params.passwordHash,
      role: params.role,
      createdAt: new Date(params.createdAt.getTime()),
    };
    this.accounts.set(account.username, account);

    return Promise.resolve({ ok: true, account: { ...account } });
  }

  findAccount(username: string): Promise<Account | undefined> {
    const account = this.accounts.get(username);
    return Promise.resolve(account ? { ...account } : undefined);
  }

  isUsernameAvailable(username: string): Promise<boolean> {
    return Promise.resolve(!this.accounts.has(username));
  }
}
