/**
 * backend/src/shared/security/sha256-log-key-hasher.ts
 *
 * WHY:
 * - Concrete LogKeyHasher using SHA-256 (deterministic, so repeated attempts
 *   for the same username share one key).
 * - Truncated: a log correlation key, not a security boundary.
 */

import { createHash } from 'node:crypto';
import type { LogKeyHasher } from './log-key-hasher';

const KEY_LENGTH = 16;

export class Sha256LogKeyHasher implements LogKeyHasher {
  hash(value: string): string {
    return createHash('sha256').update(value).digest('hex').slice(0, KEY_LENGTH);
  }
}
