/**
 * src/modules/auth/auth.controller.ts
 *
 * WHY:
 * - Maps HTTP → service call for the user endpoints.
 * - Returns structured responses.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Bearer verification happens in the auth-context hook; /user/me only reads it.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { registerSchema, loginSchema } from './auth.schemas';
import { AppError } from '../../shared/http/errors';
import { requireSession } from '../../shared/http/require-auth-context';
import type { AuthService } from './auth.service';

export class AuthController {
  constructor(private readonly authService: AuthService) {}

  async register(req: FastifyRequest, reply: FastifyReply) {
    const parsed = registerSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const account = await this.authService.registerUser({
      username: parsed.data.username,
      password: parsed.data.password,
      requestId: req.requestContext.requestId,
    });

    return reply.status(201).send({
      username: account.username,
      role: account.role,
      createdAt: account.createdAt.toISOString(),
    });
  }

  async login(req: FastifyRequest, reply: FastifyReply) {
    const parsed = loginSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const result = await this.authService.loadUser({
      username: parsed.data.username,
      password: parsed.data.password,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send({
      token: result.token,
      tokenType: result.tokenType,
      expiresAt: result.expiresAt.toISOString(),
    });
  }

  async me(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);

    return reply.status(200).send({
      username: session.username,
      role: session.role,
      expiresAt: session.expiresAt.toISOString(),
    });
  }
}
