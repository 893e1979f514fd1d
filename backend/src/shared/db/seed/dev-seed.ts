/**
 * backend/src/shared/db/seed/dev-seed.ts
 *
 * DEV-ONLY seed bootstrap.
 *
 * Creates:
 * - one account (if the username is still free) so a fresh local stack can
 *   log in right away.
 *
 * Idempotent: safe to run on every start.
 *
 * IMPORTANT:
 * - The plaintext password only comes from env; it is never logged.
 * - A race with a real registration is harmless: saveAccount reports the
 *   duplicate and the seed treats it as "already seeded".
 */

import { DEFAULT_ACCOUNT_ROLE, type CredentialStore } from '../../../modules/accounts';
import type { PasswordHasher } from '../../security/password-hasher';
import { logger } from '../../logger/logger';

type DevSeedOptions = {
  username: string;
  password: string;
};

export type DevSeedResult = 'created' | 'already_present';

export async function runDevSeed(opts: {
  credentialStore: CredentialStore;
  passwordHasher: PasswordHasher;
  options: DevSeedOptions;
}): Promise<DevSeedResult> {
  const { credentialStore, passwordHasher, options } = opts;

  if (!(await credentialStore.isUsernameAvailable(options.username))) {
    logger.info('seed.account.exists', { flow: 'seed.dev', username: options.username });
    return 'already_present';
  }

  const saved = await credentialStore.saveAccount({
    username: options.username,
    passwordHash: await passwordHasher.hash(options.password),
    role: DEFAULT_ACCOUNT_ROLE,
    createdAt: new Date(),
  });

  if (!saved.ok) {
    logger.info('seed.account.exists', { flow: 'seed.dev', username: options.username });
    return 'already_present';
  }

  logger.info('seed.account.created', { flow: 'seed.dev', username: options.username });
  return 'created';
}
