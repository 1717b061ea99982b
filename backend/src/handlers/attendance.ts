import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { z } from 'zod';
import { API_PATHS, ATTENDANCE_METHODS, ERRORS, type AttendanceQuery } from '@rollcall/shared';
import { success, error, failure } from '../utils/response.js';
import { parseBody, queryParam } from '../utils/request.js';
import { requireAuth } from '../middleware/auth.js';
import { getServices } from '../app.js';

const statusSchema = z.union([z.number(), z.boolean()]);

const markSchema = z.object({
  studentId: z.string(),
  status: statusSchema.optional(),
  course: z.string().trim().nullable().optional(),
  method: z.string().trim().min(1).optional(),
});

const updateStatusSchema = z.object({
  studentId: z.string(),
  date: z.string(),
  status: statusSchema,
});

export async function handler(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  const path = event.path;
  const method = event.httpMethod;

  try {
    // POST /attendance
    if (path === API_PATHS.ATTENDANCE && method === 'POST') {
      return await handleMark(event);
    }
    // GET /attendance?from=...&to=...&course=...
    if (path === API_PATHS.ATTENDANCE && method === 'GET') {
      return await handleList(event);
    }
    // PUT /attendance/status
    if (path === API_PATHS.ATTENDANCE_STATUS && method === 'PUT') {
      return await handleUpdateStatus(event);
    }

    return error(ERRORS.NOT_FOUND, 404);
  } catch (err) {
    console.error('Attendance handler error:', err);
    return error('Internal server error', 500);
  }
}

async function handleMark(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  const auth = await requireAuth(event);
  if (auth.user === null) return auth.errorResponse;

  const parsed = parseBody(event, markSchema);
  if ('parseError' in parsed) return parsed.parseError;
  const { studentId, status, course, method } = parsed.body;

  const { attendance } = await getServices();
  const result = await attendance.markAttendance({
    studentId,
    status,
    course,
    method: method ?? ATTENDANCE_METHODS.MANUAL,
    actor: auth.user.username,
  });
  if (!result.ok) return failure(result.error);
  return success(result.data, 201, result.message);
}

async function handleList(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  const auth = await requireAuth(event);
  if (auth.user === null) return auth.errorResponse;

  // Teachers see what they recorded; admins see everything, optionally by issuer.
  const query: AttendanceQuery = {
    from: queryParam(event, 'from'),
    to: queryParam(event, 'to'),
    course: queryParam(event, 'course'),
    createdBy: auth.user.role === 'admin' ? queryParam(event, 'createdBy') : auth.user.username,
  };

  const { attendance } = await getServices();
  const result = await attendance.listRecords(query);
  if (!result.ok) return failure(result.error);
  return success({ records: result.data });
}

async function handleUpdateStatus(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  const auth = await requireAuth(event);
  if (auth.user === null) return auth.errorResponse;

  const parsed = parseBody(event, updateStatusSchema);
  if ('parseError' in parsed) return parsed.parseError;
  const { studentId, date, status } = parsed.body;

  const { attendance } = await getServices();
  const result = await attendance.updateStatus(studentId, date, status, auth.user.username);
  if (!result.ok) return failure(result.error);
  return success(result.data, 200, result.message);
}
