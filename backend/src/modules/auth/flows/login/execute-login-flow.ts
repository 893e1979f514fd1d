/**
 * backend/src/modules/auth/flows/login/execute-login-flow.ts
 *
 * WHY:
 * - "Flow" = deep module for one end-to-end use-case (Ousterhout).
 * - Linear state machine: lookup → verify → issue. No retries.
 *
 * OUTCOMES:
 * - AUTHENTICATED: signed token + claims.
 * - DENIED: unknown username, wrong password, corrupt stored hash, or a
 *   password longer than the hasher reads. All of them carry the SAME AuthErrors.invalidCredentials() shape; the
 *   `reason` is only logged.
 * - SYSTEM_ERROR: store unreachable, hashing primitive failure, signing failure.
 *   Distinct from DENIED so operators can tell infrastructure faults from
 *   refused logins; the caller only sees an opaque 500.
 *
 * RULES:
 * - No HTTP concerns here.
 * - Never log the password, the stored hash, or the issued token.
 * - Unknown usernames still pay one hash computation so response time does
 *   not reveal whether the account exists.
 */

import type { Logger } from '../../../../shared/logger/logger';
import { serializeError } from '../../../../shared/logger/serialize-error';
import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import type { TokenIssuer, IssuedToken } from '../../../../shared/security/token-issuer';
import type { LogKeyHasher } from '../../../../shared/security/log-key-hasher';

import type { Account, CredentialStore } from '../../../accounts';

import { AuthErrors } from '../../auth.errors';
import { AUTH_FLOWS } from '../../auth.constants';
import type { LoginDeniedReason, LoginOutcome, LoginSystemErrorReason } from '../../auth.types';
import { classifyPasswordVerifyFailure } from '../../policies/password-verify-failure.policy';
import { exceedsPasswordByteLimit } from '../../policies/password-length.policy';

export type LoginParams = {
  username: string;
  password: string;
  requestId: string;
};

export type LoginFlowDeps = {
  credentialStore: CredentialStore;
  passwordHasher: PasswordHasher;
  tokenIssuer: TokenIssuer;
  logKeyHasher: LogKeyHasher;
  logger: Logger;
};

export async function executeLoginFlow(
  deps: LoginFlowDeps,
  params: LoginParams,
): Promise<LoginOutcome> {
  const flow = AUTH_FLOWS.login;
  const usernameKey = deps.logKeyHasher.hash(params.username);
  const logBase = { flow, requestId: params.requestId, usernameKey };

  const denied = (reason: LoginDeniedReason): LoginOutcome => {
    deps.logger.warn('auth.login.denied', { ...logBase, reason });
    return { status: 'DENIED', reason, error: AuthErrors.invalidCredentials() };
  };

  const systemError = (reason: LoginSystemErrorReason, err: unknown): LoginOutcome => {
    deps.logger.error('auth.login.system_error', {
      ...logBase,
      reason,
      err: serializeError(err),
    });
    return { status: 'SYSTEM_ERROR', reason, error: AuthErrors.loginUnavailable() };
  };

  deps.logger.info('auth.login.start', logBase);

  // No account can hold such a password; bcrypt would compare a truncated prefix.
  if (exceedsPasswordByteLimit(params.password)) {
    return denied('password_too_long');
  }

  // 1) Lookup
  let account: Account | undefined;
  try {
    account = await deps.credentialStore.findAccount(params.username);
  } catch (err: unknown) {
    return systemError('store_failed', err);
  }

  if (!account) {
    try {
      await deps.passwordHasher.hash(params.password);
    } catch (err: unknown) {
      return systemError('hash_failed', err);
    }
    return denied('account_not_found');
  }

  // 2) Verify
  let matches: boolean;
  try {
    matches = await deps.passwordHasher.verify(params.password, account.passwordHash);
  } catch (err: unknown) {
    const kind = classifyPasswordVerifyFailure(err);
    if (kind === 'malformed_password_hash') return denied(kind);
    return systemError(kind, err);
  }

  if (!matches) {
    return denied('password_mismatch');
  }

  // 3) Issue
  let issued: IssuedToken;
  try {
    issued = deps.tokenIssuer.issue(account.username, account.role);
  } catch (err: unknown) {
    return systemError('token_issuance_failed', err);
  }

  deps.logger.info('auth.login.success', {
    ...logBase,
    role: issued.claims.role,
    expiresAt: issued.claims.expiresAt.toISOString(),
  });

  return { status: 'AUTHENTICATED', token: issued.token, claims: issued.claims };
}
