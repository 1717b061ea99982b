import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { z } from 'zod';
import {
  ACCESS_LIMITS,
  API_PATHS,
  ERRORS,
  QUERY_PARAMS,
  type CreateLinkRequest,
  type CreateLinkResponse,
  type CreateSessionRequest,
  type CreateSessionResponse,
  type SessionMarkRequest,
  type SetMaxUsesRequest,
  type UserProfile,
} from '@rollcall/shared';
import { success, error, failure } from '../utils/response.js';
import { parseBody, queryParam } from '../utils/request.js';
import { shareUrl } from '../utils/links.js';
import { validateHoneypot } from '../middleware/honeypot.js';
import { requireAuth } from '../middleware/auth.js';
import { getServices } from '../app.js';

const optionalCourse = z.string().trim().nullable().optional();

const createSessionSchema: z.ZodType<CreateSessionRequest> = z.object({
  description: z.string(),
  course: optionalCourse,
  durationHours: z.number().optional(),
});

const createLinkSchema: z.ZodType<CreateLinkRequest> = z.object({
  studentId: z.string(),
  course: optionalCourse,
  durationHours: z.number().optional(),
  maxUses: z.number().int().positive().nullable().optional(),
});

const maxUsesSchema: z.ZodType<SetMaxUsesRequest> = z.object({
  linkId: z.string(),
  maxUses: z.number().nullable(),
});

const sessionIdSchema = z.object({ sessionId: z.string() });
const linkIdSchema = z.object({ linkId: z.string() });
const sessionMarkSchema: z.ZodType<SessionMarkRequest> = z.object({
  studentId: z.string().trim().min(1).max(ACCESS_LIMITS.STUDENT_ID_MAX_LENGTH),
});

// Admins manage every grant; teachers only the ones they issued.
function ownerOf(user: UserProfile): string | undefined {
  return user.role === 'admin' ? undefined : user.username;
}

export async function handler(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  const path = event.path;
  const method = event.httpMethod;

  try {
    // GET /attend?session=... | ?student_link=...
    if (path === API_PATHS.ATTEND && method === 'GET') {
      return await handleResolve(event);
    }
    // POST /attend?session=... | ?student_link=...
    if (path === API_PATHS.ATTEND && method === 'POST') {
      return await handleAttend(event);
    }
    // POST /sessions
    if (path === API_PATHS.SESSIONS && method === 'POST') {
      return await handleCreateSession(event);
    }
    // GET /sessions
    if (path === API_PATHS.SESSIONS && method === 'GET') {
      return await handleListSessions(event);
    }
    // POST /sessions/deactivate
    if (path === API_PATHS.SESSIONS_DEACTIVATE && method === 'POST') {
      return await handleDeactivateSession(event);
    }
    // POST /links
    if (path === API_PATHS.LINKS && method === 'POST') {
      return await handleCreateLink(event);
    }
    // GET /links
    if (path === API_PATHS.LINKS && method === 'GET') {
      return await handleListLinks(event);
    }
    // PUT /links/max-uses
    if (path === API_PATHS.LINKS_MAX_USES && method === 'PUT') {
      return await handleSetMaxUses(event);
    }
    // POST /links/deactivate
    if (path === API_PATHS.LINKS_DEACTIVATE && method === 'POST') {
      return await handleDeactivateLink(event);
    }

    return error(ERRORS.NOT_FOUND, 404);
  } catch (err) {
    console.error('Access handler error:', err);
    return error('Internal server error', 500);
  }
}

async function handleResolve(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  const sessionId = queryParam(event, QUERY_PARAMS.SESSION);
  const linkId = queryParam(event, QUERY_PARAMS.STUDENT_LINK);
  const { access } = await getServices();

  if (sessionId) {
    const result = await access.resolveSession(sessionId);
    if (!result.ok) return failure(result.error);
    const { description, course, expiresAt } = result.data;
    return success({ kind: 'session', description, course, expiresAt });
  }
  if (linkId) {
    const result = await access.resolvePersonalLink(linkId);
    if (!result.ok) return failure(result.error);
    const { studentId, course, expiresAt } = result.data;
    return success({ kind: 'link', studentId, course, expiresAt });
  }
  return error(ERRORS.INVALID_REQUEST, 400, undefined, 'INVALID_REQUEST');
}

async function handleAttend(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  const honeypot = validateHoneypot(event);
  if (honeypot.errorResponse) return honeypot.errorResponse;

  const sessionId = queryParam(event, QUERY_PARAMS.SESSION);
  const linkId = queryParam(event, QUERY_PARAMS.STUDENT_LINK);
  const { access } = await getServices();

  if (sessionId) {
    const parsed = parseBody(event, sessionMarkSchema);
    if ('parseError' in parsed) return parsed.parseError;
    const result = await access.markViaSession(sessionId, parsed.body.studentId);
    if (!result.ok) return failure(result.error);
    return success(result.data, 201, result.message);
  }
  if (linkId) {
    const result = await access.markViaLink(linkId);
    if (!result.ok) return failure(result.error);
    return success(result.data, 201, result.message);
  }
  return error(ERRORS.INVALID_REQUEST, 400, undefined, 'INVALID_REQUEST');
}

async function handleCreateSession(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  const auth = await requireAuth(event);
  if (auth.user === null) return auth.errorResponse;

  const parsed = parseBody(event, createSessionSchema);
  if ('parseError' in parsed) return parsed.parseError;

  const { access } = await getServices();
  const result = await access.createSession(parsed.body, auth.user.username);
  if (!result.ok) return failure(result.error);

  const response: CreateSessionResponse = {
    sessionId: result.data.id,
    expiresAt: result.data.expiresAt,
    shareUrl: shareUrl(QUERY_PARAMS.SESSION, result.data.id),
  };
  return success(response, 201, result.message);
}

async function handleListSessions(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  const auth = await requireAuth(event);
  if (auth.user === null) return auth.errorResponse;

  const { access } = await getServices();
  const result = await access.listActiveSessions(ownerOf(auth.user));
  if (!result.ok) return failure(result.error);
  return success({ sessions: result.data });
}

async function handleDeactivateSession(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  const auth = await requireAuth(event);
  if (auth.user === null) return auth.errorResponse;

  const parsed = parseBody(event, sessionIdSchema);
  if ('parseError' in parsed) return parsed.parseError;

  const { access } = await getServices();
  const result = await access.deactivateSession(parsed.body.sessionId, ownerOf(auth.user));
  if (!result.ok) return failure(result.error);
  return success({ success: true }, 200, result.message);
}

async function handleCreateLink(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  const auth = await requireAuth(event);
  if (auth.user === null) return auth.errorResponse;

  const parsed = parseBody(event, createLinkSchema);
  if ('parseError' in parsed) return parsed.parseError;

  const { access } = await getServices();
  const created = await access.createPersonalLink(parsed.body, auth.user.username);
  if (!created.ok) return failure(created.error);

  let maxUses: number | null = null;
  const requestedMaxUses = parsed.body.maxUses ?? null;
  if (requestedMaxUses !== null) {
    const limited = await access.setLinkMaxUses(created.data.id, requestedMaxUses);
    if (!limited.ok) {
      // A link created for a capped request never stays active uncapped.
      const withdrawn = await access.deactivateLink(created.data.id);
      if (!withdrawn.ok) {
        console.error(`Link ${created.data.id} left active without its cap: ${withdrawn.error.message}`);
      }
      return failure(limited.error);
    }
    maxUses = limited.data.maxUses;
  }

  const response: CreateLinkResponse = {
    linkId: created.data.id,
    expiresAt: created.data.expiresAt,
    maxUses,
    shareUrl: shareUrl(QUERY_PARAMS.STUDENT_LINK, created.data.id),
  };
  return success(response, 201, created.message);
}

async function handleListLinks(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  const auth = await requireAuth(event);
  if (auth.user === null) return auth.errorResponse;

  const { access } = await getServices();
  const result = await access.listActiveLinks(ownerOf(auth.user));
  if (!result.ok) return failure(result.error);
  return success({ links: result.data });
}

async function handleSetMaxUses(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  const auth = await requireAuth(event);
  if (auth.user === null) return auth.errorResponse;

  const parsed = parseBody(event, maxUsesSchema);
  if ('parseError' in parsed) return parsed.parseError;

  const { access } = await getServices();
  const result = await access.setLinkMaxUses(parsed.body.linkId, parsed.body.maxUses, ownerOf(auth.user));
  if (!result.ok) return failure(result.error);
  return success(result.data, 200, result.message);
}

async function handleDeactivateLink(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  const auth = await requireAuth(event);
  if (auth.user === null) return auth.errorResponse;

  const parsed = parseBody(event, linkIdSchema);
  if ('parseError' in parsed) return parsed.parseError;

  const { access } = await getServices();
  const result = await access.deactivateLink(parsed.body.linkId, ownerOf(auth.user));
  if (!result.ok) return failure(result.error);
  return success({ success: true }, 200, result.message);
}
