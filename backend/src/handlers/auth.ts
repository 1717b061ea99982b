import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { z } from 'zod';
import {
  API_PATHS,
  ERRORS,
  LIMITS,
  QUERY_PARAMS,
  type ChangePasswordRequest,
  type ForgotPasswordRequest,
  type ForgotPasswordResponse,
  type LoginRequest,
  type LoginResponse,
  type ResetPasswordRequest,
  type SignupRequest,
} from '@rollcall/shared';
import { success, error, failure } from '../utils/response.js';
import { parseBody, queryParam } from '../utils/request.js';
import { shareUrl } from '../utils/links.js';
import { signToken } from '../utils/jwt.js';
import { validateHoneypot } from '../middleware/honeypot.js';
import { requireAuth } from '../middleware/auth.js';
import { getServices } from '../app.js';
import { config } from '../config.js';

const FORGOT_PASSWORD_MESSAGE = 'If that email is registered, a password reset link has been issued.';

const signupSchema: z.ZodType<SignupRequest> = z.object({
  username: z.string().trim(),
  password: z.string(),
  email: z.string().trim(),
  name: z.string().trim().default(''),
});

const loginSchema: z.ZodType<LoginRequest> = z.object({
  username: z.string(),
  password: z.string(),
  twoFactorCode: z.string().optional(),
});

const changePasswordSchema: z.ZodType<ChangePasswordRequest> = z.object({
  currentPassword: z.string(),
  newPassword: z.string(),
});

const forgotPasswordSchema: z.ZodType<ForgotPasswordRequest> = z.object({
  email: z.string().trim(),
});

const resetPasswordSchema: z.ZodType<ResetPasswordRequest> = z.object({
  newPassword: z.string(),
});

export async function handler(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  const path = event.path;
  const method = event.httpMethod;

  try {
    // POST /auth/signup
    if (path === API_PATHS.AUTH_SIGNUP && method === 'POST') {
      return await handleSignup(event);
    }
    // POST /auth/login
    if (path === API_PATHS.AUTH_LOGIN && method === 'POST') {
      return await handleLogin(event);
    }
    // POST /auth/change-password
    if (path === API_PATHS.AUTH_CHANGE_PASSWORD && method === 'POST') {
      return await handleChangePassword(event);
    }
    // POST /auth/forgot-password
    if (path === API_PATHS.AUTH_FORGOT_PASSWORD && method === 'POST') {
      return await handleForgotPassword(event);
    }
    // POST /auth/reset-password?reset_token=...
    if (path === API_PATHS.AUTH_RESET_PASSWORD && method === 'POST') {
      return await handleResetPassword(event);
    }

    return error(ERRORS.NOT_FOUND, 404);
  } catch (err) {
    console.error('Auth handler error:', err);
    return error('Internal server error', 500);
  }
}

async function handleSignup(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  const honeypot = validateHoneypot(event);
  if (honeypot.errorResponse) return honeypot.errorResponse;

  const parsed = parseBody(event, signupSchema);
  if ('parseError' in parsed) return parsed.parseError;

  const { accounts } = await getServices();
  const result = await accounts.createUser({ ...parsed.body, role: 'teacher' });
  if (!result.ok) return failure(result.error);
  return success(result.data, 201, result.message);
}

async function handleLogin(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  const honeypot = validateHoneypot(event);
  if (honeypot.errorResponse) return honeypot.errorResponse;

  const parsed = parseBody(event, loginSchema);
  if ('parseError' in parsed) return parsed.parseError;
  const { username, password, twoFactorCode } = parsed.body;

  // Guard against oversized inputs before touching the store
  if (username.length > LIMITS.USERNAME_MAX_LENGTH || password.length > LIMITS.MAX_PASSWORD_LENGTH) {
    return error(ERRORS.INVALID_CREDENTIALS, 401, undefined, 'INVALID_CREDENTIALS');
  }

  const { accounts } = await getServices();
  const result = await accounts.authenticateUser(username, password);
  if (!result.ok) {
    // Unknown user and wrong password look the same from outside
    if (result.error.code === 'USER_NOT_FOUND' || result.error.code === 'INVALID_PASSWORD') {
      return error(ERRORS.INVALID_CREDENTIALS, 401, undefined, 'INVALID_CREDENTIALS');
    }
    return failure(result.error);
  }

  const secondFactor = await accounts.verifyTwoFactor(username, twoFactorCode);
  if (!secondFactor.ok) return failure(secondFactor.error);

  const session = await signToken({ username: result.data.username, role: result.data.role });
  const response: LoginResponse = { ...session, profile: result.data };
  return success(response, 200, result.message);
}

async function handleChangePassword(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  const auth = await requireAuth(event);
  if (auth.user === null) return auth.errorResponse;

  const parsed = parseBody(event, changePasswordSchema);
  if ('parseError' in parsed) return parsed.parseError;

  const { accounts } = await getServices();
  const result = await accounts.changePassword(auth.user.username, parsed.body.currentPassword, parsed.body.newPassword);
  if (!result.ok) return failure(result.error);
  return success({ success: true }, 200, result.message);
}

async function handleForgotPassword(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  const honeypot = validateHoneypot(event);
  if (honeypot.errorResponse) return honeypot.errorResponse;

  const parsed = parseBody(event, forgotPasswordSchema);
  if ('parseError' in parsed) return parsed.parseError;

  const { accounts } = await getServices();
  const result = await accounts.requestPasswordReset(parsed.body.email);
  if (!result.ok && result.error.kind === 'storage') return failure(result.error);

  // Mail delivery is out of scope: the link is returned only where the
  // environment says so, and otherwise nothing distinguishes a known address.
  const response: ForgotPasswordResponse = { message: FORGOT_PASSWORD_MESSAGE };
  if (result.ok && config.features.exposeResetTokens) {
    response.resetUrl = shareUrl(QUERY_PARAMS.RESET_TOKEN, result.data.id);
  }
  return success(response);
}

async function handleResetPassword(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  const parsed = parseBody(event, resetPasswordSchema);
  if ('parseError' in parsed) return parsed.parseError;

  const token = queryParam(event, QUERY_PARAMS.RESET_TOKEN) ?? '';
  const { accounts } = await getServices();
  const result = await accounts.resetPassword(token, parsed.body.newPassword);
  if (!result.ok) return failure(result.error);
  return success({ success: true }, 200, result.message);
}
