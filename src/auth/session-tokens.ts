/**
 * Session tokens.
 *
 * HS256 JWTs carrying the account id as `sub` and a unique `jti` so a
 * single session can be revoked on logout.
 */

import jwt from 'jsonwebtoken';
import { v4 as uuid } from 'uuid';

export interface SessionClaims {
  accountId: string;
  tokenId: string;
  expiresAt: Date;
}

export interface IssuedSession extends SessionClaims {
  token: string;
}

export class SessionTokenError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SessionTokenError';
  }
}

export class SessionTokens {
  constructor(
    private readonly secret: string,
    private readonly ttlSeconds: number,
  ) {}

  issue(accountId: string): IssuedSession {
    const tokenId = uuid();
    const token = jwt.sign({}, this.secret, {
      algorithm: 'HS256',
      subject: accountId,
      jwtid: tokenId,
      expiresIn: this.ttlSeconds,
    });
    const claims = this.verify(token);
    return { token, ...claims };
  }

  /** Verify signature and expiry; throws SessionTokenError otherwise. */
  verify(token: string): SessionClaims {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.secret, { algorithms: ['HS256'] });
    } catch (err) {
      const reason = err instanceof jwt.TokenExpiredError ? 'Session expired' : 'Invalid session token';
      throw new SessionTokenError(reason);
    }
    if (typeof decoded === 'string' || !decoded.sub || !decoded.jti || decoded.exp === undefined) {
      throw new SessionTokenError('Invalid session token');
    }
    return {
      accountId: decoded.sub,
      tokenId: decoded.jti,
      expiresAt: new Date(decoded.exp * 1000),
    };
  }
}
