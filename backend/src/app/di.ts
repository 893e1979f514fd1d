/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db) and shares them safely.
 * - Keeps modules testable (tests run the same graph on the in-memory store).
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (which store, which bcrypt cost) belong HERE,
 *   not inside the classes themselves (DIP).
 */

import type { AppConfig } from './config';
import { createDb, type Db } from '../shared/db/db';

import type { PasswordHasher } from '../shared/security/password-hasher';
import { BcryptPasswordHasher } from '../shared/security/bcrypt-password-hasher';
import type { TokenIssuer } from '../shared/security/token-issuer';
import { JwtTokenIssuer } from '../shared/security/jwt-token-issuer';
import type { LogKeyHasher } from '../shared/security/log-key-hasher';
import { Sha256LogKeyHasher } from '../shared/security/sha256-log-key-hasher';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { createAccountModule } from '../modules/accounts/account.module';
import type { AccountModule } from '../modules/accounts/account.module';

import { createAuthModule } from '../modules/auth/auth.module';
import type { AuthModule } from '../modules/auth/auth.module';

export type AppDeps = {
  db: Db | null;

  logger: Logger;

  passwordHasher: PasswordHasher;
  tokenIssuer: TokenIssuer;
  logKeyHasher: LogKeyHasher;

  // modules
  accounts: AccountModule;
  auth: AuthModule;

  // lifecycle
  close: () => Promise<void>;
};

export function buildDeps(config: AppConfig): AppDeps {
  const db = config.store.driver === 'postgres' ? createDb(config.store.databaseUrl) : null;

  const passwordHasher: PasswordHasher = new BcryptPasswordHasher({
    cost: config.bcryptCost,
  });
  const tokenIssuer: TokenIssuer = new JwtTokenIssuer(config.token);
  const logKeyHasher: LogKeyHasher = new Sha256LogKeyHasher();

  // modules (no HTTP / no business logic here)
  const accounts = createAccountModule(db ? { store: 'postgres', db } : { store: 'memory' });

  const auth = createAuthModule({
    credentialStore: accounts.credentialStore,
    passwordHasher,
    tokenIssuer,
    logKeyHasher,
    logger,
  });

  return {
    db,
    logger,
    passwordHasher,
    tokenIssuer,
    logKeyHasher,
    accounts,
    auth,
    close: async () => {
      await db?.destroy();
    },
  };
}
