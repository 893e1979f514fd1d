/**
 * src/modules/auth/auth.service.ts
 *
 * WHY:
 * - Inbound use-case surface for adapters: registerUser() and loadUser().
 * - Flows return tagged outcomes; this is the one place that turns them into
 *   thrown AppErrors for the HTTP layer.
 *
 * RULES:
 * - No HTTP concerns here.
 * - Every outcome status must be handled (exhaustive switch).
 */

import type { Logger } from '../../shared/logger/logger';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { TokenIssuer } from '../../shared/security/token-issuer';
import type { LogKeyHasher } from '../../shared/security/log-key-hasher';

import type { AccountView, CredentialStore } from '../accounts';

import type { LoginResult } from './auth.types';
import { executeRegisterFlow, type RegisterParams } from './flows/register/execute-register-flow';
import { executeLoginFlow, type LoginParams } from './flows/login/execute-login-flow';

export type AuthServiceDeps = {
  credentialStore: CredentialStore;
  passwordHasher: PasswordHasher;
  tokenIssuer: TokenIssuer;
  logKeyHasher: LogKeyHasher;
  logger: Logger;
};

export class AuthService {
  constructor(private readonly deps: AuthServiceDeps) {}

  async registerUser(params: RegisterParams): Promise<AccountView> {
    const outcome = await executeRegisterFlow(this.deps, params);

    switch (outcome.status) {
      case 'REGISTERED':
        return outcome.account;
      case 'INVALID':
      case 'CONFLICT':
      case 'SYSTEM_ERROR':
        throw outcome.error;
    }
  }

  async loadUser(params: LoginParams): Promise<LoginResult> {
    const outcome = await executeLoginFlow(this.deps, params);

    switch (outcome.status) {
      case 'AUTHENTICATED':
        return {
          token: outcome.token,
          tokenType: 'Bearer',
          expiresAt: outcome.claims.expiresAt,
        };
      case 'DENIED':
      case 'SYSTEM_ERROR':
        throw outcome.error;
    }
  }
}
