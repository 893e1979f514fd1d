/**
 * WHY:
 * - Registration must never reach the hasher or the store with an empty
 *   username or password, whatever the HTTP layer already checked.
 * - Keep rule pure + unit-testable.
 *
 * RULES:
 * - Empty string → validation error. Whitespace is NOT trimmed: usernames are
 *   stored exactly as given.
 * - Password over PASSWORD_MAX_BYTES (UTF-8) → validation error.
 */

import type { AppError } from '../../../shared/http/errors';
import { AuthErrors } from '../auth.errors';
import type { RegisterInvalidReason } from '../auth.types';
import { exceedsPasswordByteLimit } from './password-length.policy';

export type RegisterInputLike = Readonly<{
  username: string;
  password: string;
}>;

export type RegisterInputFailure = {
  reason: RegisterInvalidReason;
  error: AppError;
};

export function getRegisterInputFailure(input: RegisterInputLike): RegisterInputFailure | null {
  if (input.username.length === 0) {
    return { reason: 'empty_username', error: AuthErrors.missingCredentials() };
  }
  if (input.password.length === 0) {
    return { reason: 'empty_password', error: AuthErrors.missingCredentials() };
  }
  if (exceedsPasswordByteLimit(input.password)) {
    return { reason: 'password_too_long', error: AuthErrors.passwordTooLong() };
  }
  return null;
}
