/**
 * src/modules/auth/auth.types.ts
 *
 * WHY:
 * - Flow outcomes are tagged unions so every caller has to handle denial and
 *   system failure explicitly (switch on `status`).
 * - Internal `reason` values are for logs only; only `error` ever reaches HTTP.
 *
 * RULES:
 * - Never include raw passwords, hashes, or tokens in response types
 *   (LoginResult carries the freshly issued token, which is the point of login).
 */

import type { AppError } from '../../shared/http/errors';
import type { SessionClaims } from '../../shared/security/token-issuer';
import type { AccountView } from '../accounts';

export type RegisterInvalidReason = 'empty_username' | 'empty_password' | 'password_too_long';
export type RegisterSystemErrorReason = 'hash_failed' | 'store_failed';

export type RegisterOutcome =
  | { status: 'REGISTERED'; account: AccountView }
  | { status: 'INVALID'; reason: RegisterInvalidReason; error: AppError }
  | { status: 'CONFLICT'; error: AppError }
  | { status: 'SYSTEM_ERROR'; reason: RegisterSystemErrorReason; error: AppError };

export type LoginDeniedReason =
  | 'account_not_found'
  | 'password_mismatch'
  | 'malformed_password_hash'
  | 'password_too_long';
export type LoginSystemErrorReason = 'store_failed' | 'hash_failed' | 'token_issuance_failed';

export type LoginOutcome =
  | { status: 'AUTHENTICATED'; token: string; claims: SessionClaims }
  | { status: 'DENIED'; reason: LoginDeniedReason; error: AppError }
  | { status: 'SYSTEM_ERROR'; reason: LoginSystemErrorReason; error: AppError };

export type LoginResult = {
  token: string;
  tokenType: 'Bearer';
  expiresAt: Date;
};
