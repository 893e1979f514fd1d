/**
 * backend/src/shared/security/token-issuer.ts
 *
 * WHY:
 * - Login hands out a stateless bearer token carrying identity + role + expiry.
 * - Flows depend on this interface (DIP), not on a JWT library directly.
 *
 * RULES:
 * - Tokens are never persisted server-side; they are valid until expiresAt.
 * - A signing failure is never skipped: issue() throws TokenIssuanceError.
 * - verify() is only for inbound adapters (bearer auth on protected routes).
 */

export type SessionClaims = Readonly<{
  username: string;
  role: string;
  issuedAt: Date;
  expiresAt: Date;
}>;

export type IssuedToken = Readonly<{
  token: string;
  claims: SessionClaims;
}>;

/**
 * Built once by the composition root and handed to the issuer.
 * The signing key lives as long as the process does.
 */
export type TokenIssuerConfig = Readonly<{
  signingKey: string;
  ttlSeconds: number;
}>;

export interface TokenIssuer {
  issue(username: string, role: string): IssuedToken;

  /** Returns null for anything that is not a valid, unexpired token. */
  verify(token: string): SessionClaims | null;
}

export class TokenIssuanceError extends Error {
  constructor(message: string, opts?: { cause?: unknown }) {
    super(message, opts);
    this.name = 'TokenIssuanceError';
  }
}
