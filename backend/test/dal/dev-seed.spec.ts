import { describe, it, expect, vi } from 'vitest';
import { runDevSeed } from '../../src/shared/db/seed/dev-seed';
import { InMemCredentialStore } from '../../src/modules/accounts/dal/inmem-credential-store';
import { FakePasswordHasher } from '../helpers/fake-password-hasher';

const options = { username: 'dev-user', password: 'dev-password' };

describe('runDevSeed', () => {
  it('creates the seed account on a fresh store', async () => {
    const credentialStore = new InMemCredentialStore();

    const result = await runDevSeed({
      credentialStore,
      passwordHasher: new FakePasswordHasher(),
      options,
    });

    expect(result).toBe('created');
    const account = await credentialStore.findAccount('dev-user');
    expect(account?.role).toBe('USER');
    expect(account?.passwordHash).toBe('fake$1$dev-password');
  });

  it('is idempotent and does not rehash on the second run', async () => {
    const credentialStore = new InMemCredentialStore();
    const passwordHasher = new FakePasswordHasher();
    await runDevSeed({ credentialStore, passwordHasher, options });
    const hashSpy = vi.spyOn(passwordHasher, 'hash');

    const result = await runDevSeed({ credentialStore, passwordHasher, options });

    expect(result).toBe('already_present');
    expect(hashSpy).not.toHaveBeenCalled();
    expect((await credentialStore.findAccount('dev-user'))?.passwordHash).toBe('fake$1$dev-password');
  });

  it('treats a duplicate reported on save as already present', async () => {
    const credentialStore = new InMemCredentialStore();
    vi.spyOn(credentialStore, 'isUsernameAvailable').mockResolvedValue(true);
    vi.spyOn(credentialStore, 'saveAccount').mockResolvedValue({
      ok: false,
      reason: 'duplicate_username',
    });

    const result = await runDevSeed({
      credentialStore,
      passwordHasher: new FakePasswordHasher(),
      options,
    });

    expect(result).toBe('already_present');
  });
});
