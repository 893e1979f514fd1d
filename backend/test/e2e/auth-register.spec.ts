import { describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';

/**
 * E2E tests for POST /user/register.
 *
 * Contract:
 * - 201 with the public account view (never the hash).
 * - 409 on a taken username; the first account is untouched.
 * - 400 on a malformed body or empty credentials.
 */

type RegisterResponse = { username: string; role: string; createdAt: string };
type ErrorResponse = { error: { code: string; message: string } };

describe('POST /user/register', () => {
  it('creates the account and returns its public view', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      const before = Date.now();
      const res = await app.inject({
        method: 'POST',
        url: '/user/register',
        payload: { username: 'alice', password: 'correcthorse' },
      });

      expect(res.statusCode).toBe(201);
      const body = res.json<RegisterResponse>();
      expect(Object.keys(body).sort()).toEqual(['createdAt', 'role', 'username']);
      expect(body.username).toBe('alice');
      expect(body.role).toBe('USER');
      expect(new Date(body.createdAt).toISOString()).toBe(body.createdAt);
      expect(new Date(body.createdAt).getTime()).toBeGreaterThanOrEqual(before);

      const stored = await deps.accounts.credentialStore.findAccount('alice');
      expect(stored?.passwordHash).toMatch(/^\$2[aby]\$04\$/);
      expect(stored?.passwordHash).not.toBe('correcthorse');
    } finally {
      await close();
    }
  });

  it('returns 409 for a taken username and keeps the first password', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      await app.inject({
        method: 'POST',
        url: '/user/register',
        payload: { username: 'alice', password: 'correcthorse' },
      });
      const firstHash = (await deps.accounts.credentialStore.findAccount('alice'))?.passwordHash;

      const res = await app.inject({
        method: 'POST',
        url: '/user/register',
        payload: { username: 'alice', password: 'something-else' },
      });

      expect(res.statusCode).toBe(409);
      expect(res.json<ErrorResponse>()).toEqual({
        error: { code: 'CONFLICT', message: 'This username is already taken.' },
      });
      expect((await deps.accounts.credentialStore.findAccount('alice'))?.passwordHash).toBe(
        firstHash,
      );
    } finally {
      await close();
    }
  });

  it('returns 400 for empty credentials and stores nothing', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      const res = await app.inject({
        method: 'POST',
        url: '/user/register',
        payload: { username: '', password: 'correcthorse' },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json<ErrorResponse>()).toEqual({
        error: { code: 'VALIDATION_ERROR', message: 'Username and password are required.' },
      });
      await expect(deps.accounts.credentialStore.isUsernameAvailable('')).resolves.toBe(true);
    } finally {
      await close();
    }
  });

  it('returns 400 when a field is missing', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({
        method: 'POST',
        url: '/user/register',
        payload: { username: 'alice' },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json<ErrorResponse>()).toEqual({
        error: { code: 'VALIDATION_ERROR', message: 'Invalid request body' },
      });
    } finally {
      await close();
    }
  });

  it('returns 400 for a body that is not JSON', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({
        method: 'POST',
        url: '/user/register',
        headers: { 'content-type': 'application/json' },
        payload: '{"username":',
      });

      expect(res.statusCode).toBe(400);
      expect(res.json<ErrorResponse>().error.code).toBe('BAD_REQUEST');
    } finally {
      await close();
    }
  });

  it('returns 400 for a password over 72 bytes and stores nothing', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      const res = await app.inject({
        method: 'POST',
        url: '/user/register',
        payload: { username: 'alice', password: 'a'.repeat(72) + 'correct' },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json<ErrorResponse>()).toEqual({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Password must be at most 72 bytes (UTF-8).',
        },
      });
      await expect(deps.accounts.credentialStore.isUsernameAvailable('alice')).resolves.toBe(true);
    } finally {
      await close();
    }
  });
});
