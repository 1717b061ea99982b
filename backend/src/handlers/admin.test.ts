import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { API_PATHS, type UserProfile } from '@rollcall/shared';
import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';

vi.mock('../utils/crypto.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../utils/crypto.js')>();
  return {
    ...actual,
    hashPassword: vi.fn(async (password: string) => `hashed:${password}`),
    verifyPassword: vi.fn(async (password: string, hash: string) => hash === `hashed:${password}`),
  };
});

vi.mock('../middleware/auth.js', () => ({
  requireRole: vi.fn(),
}));

vi.mock('../app.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../app.js')>();
  return { ...actual, getServices: vi.fn() };
});

import { handler } from './admin.js';
import { requireRole } from '../middleware/auth.js';
import { buildServices, getServices, type Services } from '../app.js';
import { createJsonFileStore } from '../store/json-file.js';
import type { Store } from '../store/index.js';
import { error } from '../utils/response.js';

const mockRequireRole = vi.mocked(requireRole);

const admin: UserProfile = { username: 'admin', role: 'admin', name: 'Admin', email: 'admin@x.com' };

function makeEvent(path: string, method: string, body?: object): APIGatewayProxyEvent {
  return {
    path,
    httpMethod: method,
    headers: {},
    body: body === undefined ? null : JSON.stringify(body),
    multiValueHeaders: {},
    queryStringParameters: null,
    multiValueQueryStringParameters: null,
    pathParameters: null,
    stageVariables: null,
    requestContext: {} as APIGatewayProxyEvent['requestContext'],
    resource: path,
    isBase64Encoded: false,
  };
}

function bodyOf(res: APIGatewayProxyResult) {
  return JSON.parse(res.body);
}

let dataDir: string;
let store: Store;
let services: Services;

beforeEach(async () => {
  vi.useFakeTimers({ toFake: ['Date'] });
  vi.setSystemTime(new Date('2024-03-05T09:00:00.000Z'));
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  dataDir = await mkdtemp(join(tmpdir(), 'rollcall-admin-handler-'));
  store = createJsonFileStore(dataDir);
  services = buildServices(store, { backend: 'file', fellBack: false });
  vi.mocked(getServices).mockResolvedValue(services);
  mockRequireRole.mockResolvedValue({ user: admin, errorResponse: null });
  await services.accounts.createUser({ ...admin, password: 'Admin123!' });
  await services.accounts.createUser({
    username: 'alice',
    password: 'Abc12345!',
    email: 'a@x.com',
    name: 'Alice',
    role: 'teacher',
  });
});

afterEach(async () => {
  vi.useRealTimers();
  vi.restoreAllMocks();
  await rm(dataDir, { recursive: true, force: true });
});

describe('access control', () => {
  it('returns the role check response for non-admins', async () => {
    mockRequireRole.mockResolvedValue({ user: null, errorResponse: error('Forbidden', 403) });
    const res = await handler(makeEvent(API_PATHS.ADMIN_USERS, 'GET'));
    expect(res.statusCode).toBe(403);
    expect(mockRequireRole).toHaveBeenCalledWith(expect.anything(), 'admin');
  });

  it('returns 404 for an unknown path', async () => {
    const res = await handler(makeEvent('/admin/unknown', 'GET'));
    expect(res.statusCode).toBe(404);
  });
});

describe('GET /admin/users', () => {
  it('lists accounts sorted by username', async () => {
    const res = await handler(makeEvent(API_PATHS.ADMIN_USERS, 'GET'));
    expect(res.statusCode).toBe(200);
    expect(bodyOf(res).data.users).toEqual([
      {
        username: 'admin',
        name: 'Admin',
        email: 'admin@x.com',
        role: 'admin',
        status: 'active',
        failedAttempts: 0,
        isLocked: false,
        createdAt: '2024-03-05T09:00:00.000Z',
        lastLogin: null,
      },
      {
        username: 'alice',
        name: 'Alice',
        email: 'a@x.com',
        role: 'teacher',
        status: 'active',
        failedAttempts: 0,
        isLocked: false,
        createdAt: '2024-03-05T09:00:00.000Z',
        lastLogin: null,
      },
    ]);
  });
});

describe('POST /admin/users', () => {
  it('creates a teacher by default', async () => {
    const res = await handler(
      makeEvent(API_PATHS.ADMIN_USERS, 'POST', { username: 'bob', password: 'Bob12345!', email: 'b@x.com' }),
    );
    expect(res.statusCode).toBe(201);
    expect(bodyOf(res).data).toEqual({ username: 'bob', role: 'teacher', name: '', email: 'b@x.com' });
  });

  it('creates another admin on request', async () => {
    const res = await handler(
      makeEvent(API_PATHS.ADMIN_USERS, 'POST', {
        username: 'carol',
        password: 'Carol123!',
        email: 'c@x.com',
        name: 'Carol',
        role: 'admin',
      }),
    );
    expect(bodyOf(res).data.role).toBe('admin');
  });

  it('returns 409 for a taken email', async () => {
    const res = await handler(
      makeEvent(API_PATHS.ADMIN_USERS, 'POST', { username: 'bob', password: 'Bob12345!', email: 'a@x.com' }),
    );
    expect(res.statusCode).toBe(409);
    expect(bodyOf(res).code).toBe('EMAIL_TAKEN');
  });
});

describe('account updates', () => {
  it('sets the status', async () => {
    const res = await handler(makeEvent(API_PATHS.ADMIN_USERS_STATUS, 'PUT', { username: 'alice', status: 'inactive' }));
    expect(res.statusCode).toBe(200);
    expect(bodyOf(res)).toMatchObject({ data: { status: 'inactive' }, message: 'Status set to inactive' });
  });

  it('rejects an unknown status', async () => {
    const res = await handler(makeEvent(API_PATHS.ADMIN_USERS_STATUS, 'PUT', { username: 'alice', status: 'banned' }));
    expect(res.statusCode).toBe(400);
  });

  it('sets the role', async () => {
    const res = await handler(makeEvent(API_PATHS.ADMIN_USERS_ROLE, 'PUT', { username: 'alice', role: 'admin' }));
    expect(bodyOf(res)).toMatchObject({ data: { role: 'admin' }, message: 'Role set to admin' });
  });

  it('unlocks a locked account', async () => {
    for (let i = 0; i < 5; i++) await services.accounts.authenticateUser('alice', 'Wrong123!');

    const res = await handler(makeEvent(API_PATHS.ADMIN_USERS_UNLOCK, 'POST', { username: 'alice' }));
    expect(res.statusCode).toBe(200);
    expect(bodyOf(res).data).toMatchObject({ isLocked: false, failedAttempts: 0 });
  });

  it('returns 404 for an unknown account', async () => {
    const res = await handler(makeEvent(API_PATHS.ADMIN_USERS_UNLOCK, 'POST', { username: 'nobody' }));
    expect(res.statusCode).toBe(404);
    expect(bodyOf(res).code).toBe('USER_NOT_FOUND');
  });
});

describe('POST /admin/users/reset-token', () => {
  it('returns a reset link valid for 24 hours', async () => {
    const res = await handler(makeEvent(API_PATHS.ADMIN_USERS_RESET_TOKEN, 'POST', { username: 'alice' }));
    expect(res.statusCode).toBe(200);

    const stored = await store.users.findOne({ username: 'alice' });
    expect(bodyOf(res).data).toEqual({
      username: 'alice',
      resetUrl: `http://localhost:8501/?reset_token=${stored?.passwordResetToken}`,
      expiresAt: '2024-03-06T09:00:00.000Z',
    });
  });
});

describe('POST /admin/users/delete', () => {
  it('deletes an account', async () => {
    const res = await handler(makeEvent(API_PATHS.ADMIN_USERS_DELETE, 'POST', { username: 'alice' }));
    expect(res.statusCode).toBe(200);
    expect(bodyOf(res).message).toBe('User alice deleted');
    await expect(store.users.findOne({ username: 'alice' })).resolves.toBeNull();
  });

  it('refuses to delete the built-in admin', async () => {
    const res = await handler(makeEvent(API_PATHS.ADMIN_USERS_DELETE, 'POST', { username: 'admin' }));
    expect(res.statusCode).toBe(403);
    expect(bodyOf(res)).toEqual({
      error: 'The built-in admin account cannot be deleted',
      statusCode: 403,
      code: 'PROTECTED_ACCOUNT',
    });
  });
});
