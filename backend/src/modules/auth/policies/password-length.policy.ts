/**
 * WHY:
 * - bcrypt silently ignores everything past PASSWORD_MAX_BYTES, so two
 *   passwords sharing that prefix would hash the same.
 * - Measured in UTF-8 bytes, not characters: "é" counts as 2.
 */

import { PASSWORD_MAX_BYTES } from '../auth.constants';

export function exceedsPasswordByteLimit(password: string): boolean {
  return Buffer.byteLength(password, 'utf8') > PASSWORD_MAX_BYTES;
}
