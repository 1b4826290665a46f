import jwt from 'jsonwebtoken';

const TOKEN_TYPE = 'admin_session';

export type SessionClaims = {
  sessionId: string;
  username: string;
};

export function signSessionToken(
  secret: string,
  claims: SessionClaims,
  issuedAt: Date,
  ttlSeconds: number
): string {
  return jwt.sign({ typ: TOKEN_TYPE, iat: Math.floor(issuedAt.getTime() / 1000) }, secret, {
    algorithm: 'HS256',
    subject: claims.username,
    jwtid: claims.sessionId,
    expiresIn: ttlSeconds,
  });
}

/**
 * Verifies signature and expiry against `now`. Resolves null for any token that
 * is malformed, tampered, expired, or not an admin session token.
 */
export function verifySessionToken(secret: string, token: string, now: Date): SessionClaims | null {
  let decoded: string | jwt.JwtPayload;
  try {
    decoded = jwt.verify(token, secret, {
      algorithms: ['HS256'],
      clockTimestamp: Math.floor(now.getTime() / 1000),
    });
  } catch {
    return null;
  }
  if (typeof decoded === 'string') return null;
  if (decoded.typ !== TOKEN_TYPE) return null;
  if (typeof decoded.jti !== 'string' || !decoded.jti) return null;
  if (typeof decoded.sub !== 'string' || !decoded.sub) return null;
  return { sessionId: decoded.jti, username: decoded.sub };
}
