import jwt from 'jsonwebtoken';
import { z } from 'zod';
import type { SessionClaims } from '@rollcall/shared';
import { getJwtSecret, config } from '../config.js';

const claimsSchema = z.object({
  username: z.string().min(1),
  role: z.enum(['teacher', 'admin']),
});

export interface SignedSession {
  token: string;
  expiresAt: string;
}

export async function signToken(claims: SessionClaims): Promise<SignedSession> {
  const secret = await getJwtSecret();
  const expirySeconds = config.session.tokenExpiryHours * 3600;
  const token = jwt.sign({ username: claims.username, role: claims.role }, secret, { expiresIn: expirySeconds });
  return { token, expiresAt: new Date(Date.now() + expirySeconds * 1000).toISOString() };
}

// Throws when the token is malformed, expired, signed with another secret, or
// carries claims of the wrong shape.
export async function verifyToken(token: string): Promise<SessionClaims> {
  const secret = await getJwtSecret();
  return claimsSchema.parse(jwt.verify(token, secret));
}
