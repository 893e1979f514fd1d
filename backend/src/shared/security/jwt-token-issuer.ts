/**
 * backend/src/shared/security/jwt-token-issuer.ts
 *
 * WHY:
 * - Concrete TokenIssuer using HS256 JWTs (jsonwebtoken).
 * - Claims: { username, role, iat, exp } with exp = iat + ttlSeconds.
 *
 * HOW TO USE:
 * - const issuer = new JwtTokenIssuer({ signingKey, ttlSeconds: 86400 })
 * - const { token, claims } = issuer.issue('alice', 'USER')
 * - const claims = issuer.verify(token) // null when invalid/expired
 *
 * NOTE:
 * - JWT numeric dates are whole seconds, so issuedAt is truncated to the second
 *   and expiresAt is exactly issuedAt + ttlSeconds.
 * - `now` is injectable so tests can pin the clock.
 */

import jwt from 'jsonwebtoken';
import { z } from 'zod';
import {
  TokenIssuanceError,
  type IssuedToken,
  type SessionClaims,
  type TokenIssuer,
  type TokenIssuerConfig,
} from './token-issuer';

const ALGORITHM = 'HS256';

const TokenPayloadSchema = z.object({
  username: z.string().min(1),
  role: z.string().min(1),
  iat: z.number().int(),
  exp: z.number().int(),
});

export class JwtTokenIssuer implements TokenIssuer {
  constructor(
    private readonly config: TokenIssuerConfig,
    private readonly now: () => Date = () => new Date(),
  ) {}

  issue(username: string, role: string): IssuedToken {
    if (!this.config.signingKey) {
      throw new TokenIssuanceError('Token signing key is not configured');
    }

    const issuedAtSeconds = Math.floor(this.now().getTime() / 1000);
    const expiresAtSeconds = issuedAtSeconds + this.config.ttlSeconds;

    let token: string;
    try {
      token = jwt.sign(
        { username, role, iat: issuedAtSeconds, exp: expiresAtSeconds },
        this.config.signingKey,
        { algorithm: ALGORITHM },
      );
    } catch (err: unknown) {
      throw new TokenIssuanceError('Failed to sign session token', { cause: err });
    }

    return {
      token,
      claims: {
        username,
        role,
        issuedAt: new Date(issuedAtSeconds * 1000),
        expiresAt: new Date(expiresAtSeconds * 1000),
      },
    };
  }

  verify(token: string): SessionClaims | null {
    let decoded: unknown;
    try {
      decoded = jwt.verify(token, this.config.signingKey, {
        algorithms: [ALGORITHM],
        clockTimestamp: Math.floor(this.now().getTime() / 1000),
      });
    } catch (err: unknown) {
      // Bad signature, malformed, expired: all just mean "not a valid token".
      if (err instanceof jwt.JsonWebTokenError) return null;
      throw err;
    }

    const parsed = TokenPayloadSchema.safeParse(decoded);
    if (!parsed.success) return null;

    return {
      username: parsed.data.username,
      role: parsed.data.role,
      issuedAt: new Date(parsed.data.iat * 1000),
      expiresAt: new Date(parsed.data.exp * 1000),
    };
  }
}
