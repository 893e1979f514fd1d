import { describe, it, expect } from 'vitest';
import type { FastifyRequest } from 'fastify';
import { AppError } from '../../../../src/shared/http/errors';
import { requireSession } from '../../../../src/shared/http/require-auth-context';

function makeReq(authContext: unknown): FastifyRequest {
  return { authContext } as unknown as FastifyRequest;
}

describe('requireSession', () => {
  it('throws 401 when no auth context is present', () => {
    expect(() => requireSession(makeReq(null))).toThrowError(AppError);

    try {
      requireSession(makeReq(null));
    } catch (err) {
      expect(err).toBeInstanceOf(AppError);
      if (!(err instanceof AppError)) throw err;
      expect(err.status).toBe(401);
      expect(err.message).toBe('Authentication required');
    }
  });

  it('throws 401 for an anonymous request (no verified token)', () => {
    const req = makeReq({ username: null, role: null, expiresAt: null });

    expect(() => requireSession(req)).toThrowError('Authentication required');
  });

  it('returns the verified claims', () => {
    const expiresAt = new Date('2026-03-02T10:00:00.000Z');
    const req = makeReq({ username: 'alice', role: 'USER', expiresAt });

    expect(requireSession(req)).toEqual({ username: 'alice', role: 'USER', expiresAt });
  });
});
