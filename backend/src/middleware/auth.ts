import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { ERRORS, type SessionClaims, type UserProfile, type UserRole } from '@rollcall/shared';
import { getServices } from '../app.js';
import { verifyToken } from '../utils/jwt.js';
import { error, failure } from '../utils/response.js';

export type AuthResult =
  | { user: UserProfile; errorResponse: null }
  | { user: null; errorResponse: APIGatewayProxyResult };

// Pulls the raw JWT string out of the Authorization header.
// Expects the standard "Bearer <token>" format; returns null for any other
// format or if the header is absent entirely.
export function extractToken(event: APIGatewayProxyEvent): string | null {
  const header = event.headers?.Authorization || event.headers?.authorization;
  if (!header) return null;
  const parts = header.split(' ');
  if (parts.length !== 2 || parts[0] !== 'Bearer') return null;
  return parts[1];
}

// Verifies the JWT from the request and returns its claims, or null when the
// token is missing, malformed, expired or signed with the wrong secret.
export async function authenticate(event: APIGatewayProxyEvent): Promise<SessionClaims | null> {
  const token = extractToken(event);
  if (!token) return null;
  try {
    return await verifyToken(token);
  } catch {
    return null;
  }
}

// The token only proves who signed in. Every request also re-checks that the
// account still exists, is active and is not locked, and takes the role from
// the stored account rather than the token.
export async function requireAuth(event: APIGatewayProxyEvent): Promise<AuthResult> {
  const claims = await authenticate(event);
  if (!claims) {
    return { user: null, errorResponse: error(ERRORS.UNAUTHORIZED, 401) };
  }
  const { accounts } = await getServices();
  const current = await accounts.authenticateUser(claims.username);
  if (!current.ok) {
    const rejected = current.error.kind === 'storage' ? failure(current.error) : error(ERRORS.UNAUTHORIZED, 401);
    return { user: null, errorResponse: rejected };
  }
  return { user: current.data, errorResponse: null };
}

// A valid session with the wrong role gets a 403 rather than a 401, so the
// client knows it is authenticated but not permitted.
export async function requireRole(event: APIGatewayProxyEvent, role: UserRole): Promise<AuthResult> {
  const auth = await requireAuth(event);
  if (auth.user === null) return auth;
  if (auth.user.role !== role) {
    return { user: null, errorResponse: error(ERRORS.FORBIDDEN, 403) };
  }
  return auth;
}
