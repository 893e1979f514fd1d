/**
 * backend/src/modules/accounts/account.types.ts
 *
 * WHY:
 * - Domain types for the Accounts module.
 * - An account is one registered username + its password hash + a flat role label.
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 * - passwordHash never leaves the auth flows: responses use AccountView.
 */

/** Every self-registered account gets this role. No hierarchy is implied. */
export const DEFAULT_ACCOUNT_ROLE = 'USER';

export type Account = {
  username: string;
  passwordHash: string;
  role: string;
  createdAt: Date;
};

export type AccountView = Omit<Account, 'passwordHash'>;

export function toAccountView(account: Account): AccountView {
  return {
    username: account.username,
    role: account.role,
    createdAt: account.createdAt,
  };
}
