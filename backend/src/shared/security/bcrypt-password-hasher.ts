/**
 * backend/src/shared/security/bcrypt-password-hasher.ts
 *
 * WHY:
 * - Bcrypt is a battle-tested password hashing algorithm.
 * - We encapsulate it behind PasswordHasher so the rest of the app stays clean.
 * - The digest is self-describing ($2b$<cost>$<salt><hash>), so verification
 *   needs nothing but the stored string.
 *
 * HOW TO USE:
 * - const hasher = new BcryptPasswordHasher({ cost: 12 })
 * - const hash = await hasher.hash('secret')
 * - const ok = await hasher.verify('secret', hash)
 */

import bcrypt from 'bcrypt';
import { MalformedPasswordHashError, type PasswordHasher } from './password-hasher';

const BCRYPT_HASH_PATTERN = /^\$2[abxy]\$\d{2}\$[./A-Za-z0-9]{53}$/;

export function isBcryptHash(value: string): boolean {
  return BCRYPT_HASH_PATTERN.test(value);
}

export class BcryptPasswordHasher implements PasswordHasher {
  private readonly cost: number;

  constructor(opts?: { cost?: number }) {
    this.cost = opts?.cost ?? 12;
  }

  async hash(plain: string): Promise<string> {
    return bcrypt.hash(plain, this.cost);
  }

  async verify(plain: string, hash: string): Promise<boolean> {
    // bcrypt.compare quietly answers false for garbage input; we want to tell
    // a corrupt row apart from a wrong password in the logs.
    if (!isBcryptHash(hash)) {
      throw new MalformedPasswordHashError();
    }

    return bcrypt.compare(plain, hash);
  }
}
