/**
 * backend/src/modules/accounts/account.module.ts
 *
 * WHY:
 * - Encapsulates Accounts module wiring.
 * - Accounts is a support module (no routes of its own).
 *   The auth module consumes its CredentialStore.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - The composition root picks the store; this module only builds it.
 */

import type { DbExecutor } from '../../shared/db/db';
import type { CredentialStore } from './credential-store';
import { PgCredentialStore } from './dal/pg-credential-store';
import { InMemCredentialStore } from './dal/inmem-credential-store';

export type AccountModuleDeps = { store: 'postgres'; db: DbExecutor } | { store: 'memory' };

export type AccountModule = ReturnType<typeof createAccountModule>;

export function createAccountModule(deps: AccountModuleDeps) {
  const credentialStore: CredentialStore =
    deps.store === 'postgres' ? new PgCredentialStore(deps.db) : new InMemCredentialStore();

  return {
    credentialStore,
  };
}
