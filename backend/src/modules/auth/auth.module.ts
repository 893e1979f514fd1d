/**
 * src/modules/auth/auth.module.ts
 *
 * WHY:
 * - Encapsulates Auth module wiring.
 * - DI creates infra; module composes domain units.
 * - Auth module owns register + login + /user/me routes.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { Logger } from '../../shared/logger/logger';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { TokenIssuer } from '../../shared/security/token-issuer';
import type { LogKeyHasher } from '../../shared/security/log-key-hasher';
import type { CredentialStore } from '../accounts';

import { AuthService } from './auth.service';
import { AuthController } from './auth.controller';
import { registerAuthRoutes } from './auth.routes';

export type AuthModule = ReturnType<typeof createAuthModule>;

export function createAuthModule(deps: {
  credentialStore: CredentialStore;
  passwordHasher: PasswordHasher;
  tokenIssuer: TokenIssuer;
  logKeyHasher: LogKeyHasher;
  logger: Logger;
}) {
  const authService = new AuthService({
    credentialStore: deps.credentialStore,
    passwordHasher: deps.passwordHasher,
    tokenIssuer: deps.tokenIssuer,
    logKeyHasher: deps.logKeyHasher,
    logger: deps.logger,
  });

  const controller = new AuthController(authService);

  return {
    authService,
    registerRoutes(app: FastifyInstance) {
      registerAuthRoutes(app, controller);
    },
  };
}
