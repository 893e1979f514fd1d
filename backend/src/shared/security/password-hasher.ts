/**
 * backend/src/shared/security/password-hasher.ts
 *
 * WHY:
 * - Password hashing must be consistent, safe, and easy to swap.
 * - Services should depend on an interface (DIP), not bcrypt directly.
 *
 * HOW TO USE:
 * - const hash = await hasher.hash(password)
 * - const ok = await hasher.verify(password, hash)
 *
 * CONTRACT:
 * - hash() is salted: two calls with the same input return different digests.
 * - verify() resolves false on a clean mismatch.
 * - verify() rejects with MalformedPasswordHashError when the stored digest is
 *   not something this hasher produced. Callers must collapse both outcomes
 *   into the same denial before anything reaches a client.
 */

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, hash: string): Promise<boolean>;
}

export class MalformedPasswordHashError extends Error {
  constructor(message = 'Stored password hash is malformed') {
    super(message);
    this.name = 'MalformedPasswordHashError';
  }
}
