/**
 * src/modules/auth/auth.errors.ts
 *
 * WHY:
 * - Auth module owns its domain-specific error semantics.
 * - Security-safe: login errors never reveal whether a username exists.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include passwords, tokens, or hashes in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';
import { PASSWORD_MAX_BYTES } from './auth.constants';

export const AuthErrors = {
  /**
   * Login denied: unknown username, wrong password, or unreadable stored hash.
   *
   * SECURITY: one error for every denial reason. Distinct messages would turn
   * the login endpoint into a username-existence oracle.
   */
  invalidCredentials(meta?: AppErrorMeta) {
    return AppError.unauthorized('Invalid username or password.', meta);
  },

  /** Registration: username or password missing/empty. */
  missingCredentials(meta?: AppErrorMeta) {
    return AppError.validationError('Username and password are required.', meta);
  },

  /** Registration: password longer than the hasher can take in full. */
  passwordTooLong(meta?: AppErrorMeta) {
    return AppError.validationError(
      `Password must be at most ${PASSWORD_MAX_BYTES} bytes (UTF-8).`,
      meta,
    );
  },

  /** Registration: username already exists. Safe to reveal at sign-up. */
  usernameTaken(meta?: AppErrorMeta) {
    return AppError.conflict('This username is already taken.', meta);
  },

  /** Registration could not complete (store or hashing failure). */
  registrationUnavailable(meta?: AppErrorMeta) {
    return AppError.internal('Registration failed. Please try again later.', meta);
  },

  /** Login could not complete (store, hashing, or signing failure). */
  loginUnavailable(meta?: AppErrorMeta) {
    return AppError.internal('Sign-in is temporarily unavailable. Please try again later.', meta);
  },
} as const;
