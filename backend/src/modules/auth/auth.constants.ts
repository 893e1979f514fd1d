/**
 * backend/src/modules/auth/auth.constants.ts
 *
 * WHY:
 * - Central place for auth domain constants shared across flows and wiring.
 *
 * RULES:
 * - Must not import from DB/HTTP/framework code.
 */

/** Session tokens are valid for a fixed 24h window from issuance. */
export const SESSION_TOKEN_TTL_SECONDS = 24 * 60 * 60;

/**
 * bcrypt reads only the first 72 bytes of its input. Longer passwords would
 * match any other password sharing that prefix.
 */
export const PASSWORD_MAX_BYTES = 72;

export const AUTH_FLOWS = {
  register: 'auth.register',
  login: 'auth.login',
} as const;
