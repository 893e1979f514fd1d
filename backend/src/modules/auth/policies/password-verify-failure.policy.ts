/**
 * WHY:
 * - PasswordHasher.verify() can reject for two very different reasons:
 *   - the stored digest is corrupt (a data problem for this one account)
 *   - the hashing primitive itself failed (an infrastructure problem)
 * - The first is a denied login; the second is a system error.
 *
 * RULE:
 * - MalformedPasswordHashError → denial (same response as a wrong password).
 * - Anything else → system error.
 */

import { MalformedPasswordHashError } from '../../../shared/security/password-hasher';

export type PasswordVerifyFailureKind = 'malformed_password_hash' | 'hash_failed';

export function classifyPasswordVerifyFailure(err: unknown): PasswordVerifyFailureKind {
  return err instanceof MalformedPasswordHashError ? 'malformed_password_hash' : 'hash_failed';
}
