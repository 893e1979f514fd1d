/**
 * backend/src/modules/accounts/index.ts
 *
 * WHY:
 * - Define the public surface of the accounts module.
 * - Prevent cross-module coupling via deep imports into /queries or /dal.
 *
 * RULES:
 * - Only export stable contracts needed by other modules.
 */

export { DEFAULT_ACCOUNT_ROLE, toAccountView } from './account.types';
export type { Account, AccountView } from './account.types';
export { CredentialStoreError } from './credential-store';
export type { CredentialStore, SaveAccountParams, SaveAccountResult } from './credential-store';
