import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { z } from 'zod';
import {
  API_PATHS,
  ERRORS,
  QUERY_PARAMS,
  type CreateUserRequest,
  type ListUsersResponse,
  type ResetTokenResponse,
  type SetRoleRequest,
  type SetStatusRequest,
  type UsernameRequest,
} from '@rollcall/shared';
import { success, error, failure } from '../utils/response.js';
import { parseBody } from '../utils/request.js';
import { shareUrl } from '../utils/links.js';
import { requireRole } from '../middleware/auth.js';
import { getServices } from '../app.js';

const roleSchema = z.enum(['teacher', 'admin']);

const createUserSchema: z.ZodType<CreateUserRequest> = z.object({
  username: z.string().trim(),
  password: z.string(),
  email: z.string().trim(),
  name: z.string().trim().default(''),
  role: roleSchema.default('teacher'),
});

const usernameSchema: z.ZodType<UsernameRequest> = z.object({ username: z.string() });

const setStatusSchema: z.ZodType<SetStatusRequest> = z.object({
  username: z.string(),
  status: z.enum(['pending', 'active', 'inactive']),
});

const setRoleSchema: z.ZodType<SetRoleRequest> = z.object({
  username: z.string(),
  role: roleSchema,
});

export async function handler(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  const path = event.path;
  const method = event.httpMethod;

  try {
    const auth = await requireRole(event, 'admin');
    if (auth.user === null) return auth.errorResponse;

    // GET /admin/users
    if (path === API_PATHS.ADMIN_USERS && method === 'GET') {
      return await handleListUsers();
    }
    // POST /admin/users
    if (path === API_PATHS.ADMIN_USERS && method === 'POST') {
      return await handleCreateUser(event);
    }
    // PUT /admin/users/status
    if (path === API_PATHS.ADMIN_USERS_STATUS && method === 'PUT') {
      return await handleSetStatus(event);
    }
    // PUT /admin/users/role
    if (path === API_PATHS.ADMIN_USERS_ROLE && method === 'PUT') {
      return await handleSetRole(event);
    }
    // POST /admin/users/unlock
    if (path === API_PATHS.ADMIN_USERS_UNLOCK && method === 'POST') {
      return await handleUnlock(event);
    }
    // POST /admin/users/reset-token
    if (path === API_PATHS.ADMIN_USERS_RESET_TOKEN && method === 'POST') {
      return await handleResetToken(event);
    }
    // POST /admin/users/delete
    if (path === API_PATHS.ADMIN_USERS_DELETE && method === 'POST') {
      return await handleDelete(event);
    }

    return error(ERRORS.NOT_FOUND, 404);
  } catch (err) {
    console.error('Admin handler error:', err);
    return error('Internal server error', 500);
  }
}

async function handleListUsers(): Promise<APIGatewayProxyResult> {
  const { accounts } = await getServices();
  const result = await accounts.listUsers();
  if (!result.ok) return failure(result.error);
  const response: ListUsersResponse = { users: result.data };
  return success(response);
}

async function handleCreateUser(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  const parsed = parseBody(event, createUserSchema);
  if ('parseError' in parsed) return parsed.parseError;

  const { accounts } = await getServices();
  const result = await accounts.createUser(parsed.body);
  if (!result.ok) return failure(result.error);
  return success(result.data, 201, result.message);
}

async function handleSetStatus(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  const parsed = parseBody(event, setStatusSchema);
  if ('parseError' in parsed) return parsed.parseError;

  const { accounts } = await getServices();
  const result = await accounts.setStatus(parsed.body.username, parsed.body.status);
  if (!result.ok) return failure(result.error);
  return success(result.data, 200, result.message);
}

async function handleSetRole(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  const parsed = parseBody(event, setRoleSchema);
  if ('parseError' in parsed) return parsed.parseError;

  const { accounts } = await getServices();
  const result = await accounts.setRole(parsed.body.username, parsed.body.role);
  if (!result.ok) return failure(result.error);
  return success(result.data, 200, result.message);
}

async function handleUnlock(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  const parsed = parseBody(event, usernameSchema);
  if ('parseError' in parsed) return parsed.parseError;

  const { accounts } = await getServices();
  const result = await accounts.unlockUser(parsed.body.username);
  if (!result.ok) return failure(result.error);
  return success(result.data, 200, result.message);
}

// Reset mail is not sent from here: the admin hands the link over.
async function handleResetToken(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  const parsed = parseBody(event, usernameSchema);
  if ('parseError' in parsed) return parsed.parseError;

  const { accounts } = await getServices();
  const result = await accounts.generateResetToken(parsed.body.username);
  if (!result.ok) return failure(result.error);

  const response: ResetTokenResponse = {
    username: parsed.body.username,
    resetUrl: shareUrl(QUERY_PARAMS.RESET_TOKEN, result.data.id),
    expiresAt: result.data.expiresAt,
  };
  return success(response, 200, result.message);
}

async function handleDelete(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  const parsed = parseBody(event, usernameSchema);
  if ('parseError' in parsed) return parsed.parseError;

  const { accounts } = await getServices();
  const result = await accounts.deleteUser(parsed.body.username);
  if (!result.ok) return failure(result.error);
  return success({ success: true }, 200, result.message);
}
