/**
 * backend/src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError.
 * - We need consistent error responses across all endpoints.
 * - Internal details (meta, stack traces, store/driver errors) must never leak to clients.
 *
 * RESPONSIBILITIES:
 * - AppError → map .status and .code to structured HTTP response.
 * - Zod validation errors → 400 (safety net if controller misses).
 * - Fastify client errors (malformed JSON, wrong content type) → their 4xx status.
 * - Unexpected errors → 500 with generic message.
 * - Log all errors with request context for debugging.
 *
 * RULES:
 * - No business logic here.
 * - Never expose .meta or stack traces in responses.
 * - Log full error details (including REDACTED meta) for observability.
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import { AppError } from './errors';
import { withRequestContext } from '../logger/with-context';
import { serializeError } from '../logger/serialize-error';

type ErrorResponseBody = {
  error: {
    code: string;
    message: string;
  };
};

const SENSITIVE_META_KEYS = new Set([
  'token',
  'accessToken',
  'authorization',
  'password',
  'passwordHash',
  'secret',
  'signingKey',
]);

export function redactMeta(meta: unknown): unknown {
  if (!meta || typeof meta !== 'object') return meta;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE_META_KEYS.has(k) ? '[REDACTED]' : v;
  }
  return out;
}

function buildResponse(code: string, message: string): ErrorResponseBody {
  return { error: { code, message } };
}

function clientStatusCode(err: Error): number | null {
  if (!('statusCode' in err) || typeof err.statusCode !== 'number') return null;
  return err.statusCode >= 400 && err.statusCode < 500 ? err.statusCode : null;
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: Error, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(req);

    // 1) Known application errors
    if (err instanceof AppError) {
      const logMeta = {
        flow: 'http.error',
        code: err.code,
        status: err.status,
        message: err.message,
        meta: redactMeta(err.meta),
      };

      if (err.status >= 500) {
        log.error('app_error', logMeta);
      } else {
        log.warn('app_error', logMeta);
      }

      return reply.status(err.status).send(buildResponse(err.code, err.message));
    }

    // 2) Validation that escaped a controller
    if (err instanceof ZodError) {
      log.warn('validation_error', { flow: 'http.error', issues: err.issues });
      return reply
        .status(400)
        .send(buildResponse('VALIDATION_ERROR', 'Invalid request body'));
    }

    // 3) Fastify-level client errors (body parsing, content type)
    const clientStatus = clientStatusCode(err);
    if (clientStatus !== null) {
      log.warn('client_error', { flow: 'http.error', status: clientStatus, message: err.message });
      return reply.status(clientStatus).send(buildResponse('BAD_REQUEST', err.message));
    }

    // 4) Unexpected errors — never leak internals
    log.error('unhandled_error', { flow: 'http.error', err: serializeError(err) });

    return reply.status(500).send(buildResponse('INTERNAL', 'Internal server error'));
  });
}
