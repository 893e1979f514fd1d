/**
 * backend/src/shared/http/auth-context.ts
 *
 * WHY:
 * - Session tokens are stateless: a request is authenticated purely by
 *   presenting a valid bearer token, no server-side lookup.
 * - Controllers/services read req.authContext; they never parse headers.
 *
 * HOW IT WORKS:
 * 1. registerAuthContext() sets an anonymous context (all null) on every request.
 * 2. If `Authorization: Bearer <token>` verifies, the claims are copied in.
 * 3. An invalid/expired token leaves the request anonymous; routes that need
 *    a session reject it via requireSession().
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { TokenIssuer } from '../security/token-issuer';

export type AuthContext = {
  username: string | null;
  role: string | null;
  expiresAt: Date | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    authContext: AuthContext;
  }
}

const BEARER_PREFIX = 'bearer ';

export function readBearerToken(header: unknown): string | null {
  if (typeof header !== 'string') return null;
  if (header.slice(0, BEARER_PREFIX.length).toLowerCase() !== BEARER_PREFIX) return null;

  const token = header.slice(BEARER_PREFIX.length).trim();
  return token || null;
}

export function registerAuthContext(app: FastifyInstance, tokenIssuer: TokenIssuer) {
  app.decorateRequest('authContext', null as unknown as AuthContext);

  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.authContext = { username: null, role: null, expiresAt: null };

    const token = readBearerToken(req.headers.authorization);
    const claims = token ? tokenIssuer.verify(token) : null;
    if (claims) {
      req.authContext = {
        username: claims.username,
        role: claims.role,
        expiresAt: claims.expiresAt,
      };
    }

    done();
  });
}
