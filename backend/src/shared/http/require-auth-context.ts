/**
 * backend/src/shared/http/require-auth-context.ts
 *
 * WHY:
 * - Controllers must not duplicate "require bearer session" logic.
 * - Centralizes authContext validation to prevent drift across endpoints.
 *
 * RULES:
 * - HTTP-only helper (may depend on Fastify request typing).
 * - Must NOT touch DB, services, or token parsing.
 * - Throws AppError so error-handler maps it consistently.
 */

import type { FastifyRequest } from 'fastify';
import { AppError } from './errors';

export type RequiredAuthContext = Readonly<{
  username: string;
  role: string;
  expiresAt: Date;
}>;

/**
 * Controller guard: requires a verified bearer token.
 * Missing, invalid, and expired tokens all get the same 401.
 */
export function requireSession(req: FastifyRequest): RequiredAuthContext {
  const ctx = req.authContext;
  if (!ctx || !ctx.username || !ctx.role || !ctx.expiresAt) {
    throw AppError.unauthorized('Authentication required');
  }

  return {
    username: ctx.username,
    role: ctx.role,
    expiresAt: ctx.expiresAt,
  };
}
