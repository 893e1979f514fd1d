/**
 * backend/src/modules/auth/flows/register/execute-register-flow.ts
 *
 * WHY:
 * - "Flow" = deep module for one end-to-end use-case (Ousterhout).
 * - Keeps AuthService thin while isolating orchestration.
 *
 * STEPS:
 * 1) Reject empty username/password (never reaches hasher or store).
 * 2) Hash the password.
 * 3) Single saveAccount() with the default role and creation time.
 *    Uniqueness is the store's atomic write, not a pre-check here.
 *
 * RULES:
 * - No HTTP concerns here (controller handles that).
 * - No raw SQL here (CredentialStore port only).
 * - Returns a tagged outcome; never throws for expected failures.
 * - No token is issued on registration.
 */

import type { Logger } from '../../../../shared/logger/logger';
import { serializeError } from '../../../../shared/logger/serialize-error';
import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import type { LogKeyHasher } from '../../../../shared/security/log-key-hasher';

import {
  DEFAULT_ACCOUNT_ROLE,
  toAccountView,
  type CredentialStore,
  type SaveAccountResult,
} from '../../../accounts';

import { AuthErrors } from '../../auth.errors';
import { AUTH_FLOWS } from '../../auth.constants';
import type { RegisterOutcome } from '../../auth.types';
import { getRegisterInputFailure } from '../../policies/register-input.policy';

export type RegisterParams = {
  username: string;
  password: string;
  requestId: string;
};

export type RegisterFlowDeps = {
  credentialStore: CredentialStore;
  passwordHasher: PasswordHasher;
  logKeyHasher: LogKeyHasher;
  logger: Logger;
};

export async function executeRegisterFlow(
  deps: RegisterFlowDeps,
  params: RegisterParams,
): Promise<RegisterOutcome> {
  const flow = AUTH_FLOWS.register;
  const usernameKey = deps.logKeyHasher.hash(params.username);
  const logBase = { flow, requestId: params.requestId, usernameKey };

  deps.logger.info('auth.register.start', logBase);

  const inputFailure = getRegisterInputFailure(params);
  if (inputFailure) {
    deps.logger.warn('auth.register.invalid_input', { ...logBase, reason: inputFailure.reason });
    return { status: 'INVALID', reason: inputFailure.reason, error: inputFailure.error };
  }

  let passwordHash: string;
  try {
    passwordHash = await deps.passwordHasher.hash(params.password);
  } catch (err: unknown) {
    deps.logger.error('auth.register.system_error', {
      ...logBase,
      reason: 'hash_failed',
      err: serializeError(err),
    });
    return {
      status: 'SYSTEM_ERROR',
      reason: 'hash_failed',
      error: AuthErrors.registrationUnavailable(),
    };
  }

  let saved: SaveAccountResult;
  try {
    saved = await deps.credentialStore.saveAccount({
      username: params.username,
      passwordHash,
      role: DEFAULT_ACCOUNT_ROLE,
      createdAt: new Date(),
    });
  } catch (err: unknown) {
    deps.logger.error('auth.register.system_error', {
      ...logBase,
      reason: 'store_failed',
      err: serializeError(err),
    });
    return {
      status: 'SYSTEM_ERROR',
      reason: 'store_failed',
      error: AuthErrors.registrationUnavailable(),
    };
  }

  if (!saved.ok) {
    deps.logger.warn('auth.register.conflict', { ...logBase, reason: saved.reason });
    return { status: 'CONFLICT', error: AuthErrors.usernameTaken() };
  }

  deps.logger.info('auth.register.success', { ...logBase, role: saved.account.role });

  return { status: 'REGISTERED', account: toAccountView(saved.account) };
}
