import type { APIGatewayProxyResult } from 'aws-lambda';
import type { ApiError, ApiResponse, ErrorCode, ServiceError } from '@rollcall/shared';

function corsHeaders() {
  return {
    'Access-Control-Allow-Origin': process.env.FRONTEND_ORIGIN ?? '*',
    'Access-Control-Allow-Headers': 'Content-Type,Authorization',
    'Access-Control-Allow-Methods': 'GET,POST,PUT,OPTIONS',
  };
}

export function success<T>(data: T, statusCode = 200, message?: string): APIGatewayProxyResult {
  const body: ApiResponse<T> = { success: true, data };
  if (message) body.message = message;
  return {
    statusCode,
    headers: corsHeaders(),
    body: JSON.stringify(body),
  };
}

export function error(message: string, statusCode = 400, details?: string[], code?: ErrorCode): APIGatewayProxyResult {
  const body: ApiError = { error: message, statusCode };
  if (code) body.code = code;
  if (details) body.details = details;
  return {
    statusCode,
    headers: corsHeaders(),
    body: JSON.stringify(body),
  };
}

// State failures split by what the client can do about them.
const STATE_STATUS: Partial<Record<ErrorCode, number>> = {
  ACCOUNT_LOCKED: 423,
  TOKEN_EXPIRED: 410,
  TOKEN_INACTIVE: 410,
  USAGE_EXCEEDED: 410,
};

export function statusFor(err: ServiceError): number {
  switch (err.kind) {
    case 'validation':
      return 400;
    case 'unauthorized':
      return 401;
    case 'not_found':
      return 404;
    case 'conflict':
      return 409;
    case 'state':
      return STATE_STATUS[err.code] ?? 403;
    case 'storage':
      return 503;
  }
}

export function failure(err: ServiceError): APIGatewayProxyResult {
  return error(err.message, statusFor(err), err.details, err.code);
}
