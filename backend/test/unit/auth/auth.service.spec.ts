import { describe, it, expect } from 'vitest';
import jwt from 'jsonwebtoken';
import { AuthService } from '../../../src/modules/auth/auth.service';
import { InMemCredentialStore } from '../../../src/modules/accounts/dal/inmem-credential-store';
import { BcryptPasswordHasher } from '../../../src/shared/security/bcrypt-password-hasher';
import { JwtTokenIssuer } from '../../../src/shared/security/jwt-token-issuer';
import { Sha256LogKeyHasher } from '../../../src/shared/security/sha256-log-key-hasher';
import { AppError } from '../../../src/shared/http/errors';
import { SESSION_TOKEN_TTL_SECONDS } from '../../../src/modules/auth/auth.constants';
import { createSilentLogger } from '../../helpers/test-logger';

const SIGNING_KEY = 'test-secret-signing-key';

function buildService() {
  const credentialStore = new InMemCredentialStore();
  const service = new AuthService({
    credentialStore,
    passwordHasher: new BcryptPasswordHasher({ cost: 4 }),
    tokenIssuer: new JwtTokenIssuer({ signingKey: SIGNING_KEY, ttlSeconds: SESSION_TOKEN_TTL_SECONDS }),
    logKeyHasher: new Sha256LogKeyHasher(),
    logger: createSilentLogger(),
  });
  return { service, credentialStore };
}

async function captureError(promise: Promise<unknown>): Promise<AppError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof AppError) return err;
    throw err;
  }
  throw new Error('expected the call to fail');
}

describe('AuthService (bcrypt + JWT, in-memory store)', () => {
  it('register → login round trip for alice / correcthorse', async () => {
    const { service } = buildService();

    const account = await service.registerUser({
      username: 'alice',
      password: 'correcthorse',
      requestId: 'req-1',
    });
    expect(account.username).toBe('alice');
    expect(account.role).toBe('USER');

    const result = await service.loadUser({
      username: 'alice',
      password: 'correcthorse',
      requestId: 'req-2',
    });
    expect(result.tokenType).toBe('Bearer');

    const claims = jwt.verify(result.token, SIGNING_KEY, { algorithms: ['HS256'] });
    expect(claims).toMatchObject({ username: 'alice', role: 'USER' });
    if (typeof claims === 'string') throw new Error('expected object claims');
    expect((claims.exp ?? 0) - (claims.iat ?? 0)).toBe(86400);
    expect(result.expiresAt.getTime()).toBe((claims.exp ?? 0) * 1000);
  });

  it('wrong password and unknown user fail with the same 401', async () => {
    const { service } = buildService();
    await service.registerUser({ username: 'alice', password: 'correcthorse', requestId: 'r' });

    const wrong = await captureError(
      service.loadUser({ username: 'alice', password: 'wrong', requestId: 'r' }),
    );
    const unknown = await captureError(
      service.loadUser({ username: 'bob', password: 'anything', requestId: 'r' }),
    );

    expect(wrong.status).toBe(401);
    expect(wrong.code).toBe('UNAUTHORIZED');
    expect([unknown.status, unknown.code, unknown.message]).toEqual([
      wrong.status,
      wrong.code,
      wrong.message,
    ]);
  });

  it('second registration of a username throws 409 and keeps the first hash', async () => {
    const { service, credentialStore } = buildService();
    await service.registerUser({ username: 'alice', password: 'correcthorse', requestId: 'r' });
    const firstHash = (await credentialStore.findAccount('alice'))?.passwordHash;

    const err = await captureError(
      service.registerUser({ username: 'alice', password: 'another', requestId: 'r' }),
    );

    expect(err.status).toBe(409);
    expect(err.message).toBe('This username is already taken.');
    expect((await credentialStore.findAccount('alice'))?.passwordHash).toBe(firstHash);

    // first password still works
    await expect(
      service.loadUser({ username: 'alice', password: 'correcthorse', requestId: 'r' }),
    ).resolves.toMatchObject({ tokenType: 'Bearer' });
  });

  it('empty credentials throw 400', async () => {
    const { service } = buildService();

    const err = await captureError(
      service.registerUser({ username: '', password: 'correcthorse', requestId: 'r' }),
    );

    expect(err.status).toBe(400);
    expect(err.message).toBe('Username and password are required.');
  });
});
