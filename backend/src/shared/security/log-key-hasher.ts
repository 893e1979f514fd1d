/**
 * backend/src/shared/security/log-key-hasher.ts
 *
 * WHY:
 * - Operational logs should let us correlate attempts for one username
 *   without writing the raw username into every log line.
 * - Callers depend on an abstraction (DIP) so the digest can change later.
 *
 * HOW TO USE:
 * - const usernameKey = hasher.hash(username)
 * - log `usernameKey`, never the password, hash, or token.
 */

export interface LogKeyHasher {
  hash(value: string): string;
}
