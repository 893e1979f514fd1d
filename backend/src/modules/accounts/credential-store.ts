/**
 * backend/src/modules/accounts/credential-store.ts
 *
 * WHY:
 * - Auth flows must not know which database holds accounts.
 * - This is the only outbound port the credential flows consume; Postgres and
 *   in-memory implementations live in ./dal.
 *
 * CONTRACT:
 * - saveAccount is a single atomic insert. Username uniqueness is enforced by
 *   the store itself, so a duplicate is reported as `duplicate_username`
 *   even when two registrations race.
 * - isUsernameAvailable is an advisory pre-check only (inherently racy).
 * - findAccount resolves undefined when no account has that exact username.
 * - Infrastructure failures reject with CredentialStoreError (never a plain
 *   driver error, never a silent undefined).
 */

import type { Account } from './account.types';

export type SaveAccountParams = Readonly<{
  username: string;
  passwordHash: string;
  role: string;
  createdAt: Date;
}>;

export type SaveAccountResult =
  | { ok: true; account: Account }
  | { ok: false; reason: 'duplicate_username' };

export interface CredentialStore {
  saveAccount(params: SaveAccountParams): Promise<SaveAccountResult>;
  findAccount(username: string): Promise<Account | undefined>;
  isUsernameAvailable(username: string): Promise<boolean>;
}

export class CredentialStoreError extends Error {
  constructor(message: string, opts?: { cause?: unknown }) {
    super(message, opts);
    this.name = 'CredentialStoreError';
  }
}
