import { ERRORS, type ErrorCode, type ErrorKind, type ServiceResult, type ServiceError } from '@rollcall/shared';
import { StorageError } from '../store/errors.js';

export type Failure = { ok: false; error: ServiceError };

const KINDS: Record<ErrorCode, ErrorKind> = {
  INVALID_REQUEST: 'validation',
  INVALID_USERNAME: 'validation',
  INVALID_EMAIL: 'validation',
  EMPTY_PASSWORD: 'validation',
  TOO_SHORT: 'validation',
  WEAK_PASSWORD: 'validation',
  INVALID_DURATION: 'validation',
  INVALID_MAX_USES: 'validation',
  INVALID_DATE: 'validation',
  INVALID_OR_EXPIRED_TOKEN: 'validation',
  USER_NOT_FOUND: 'not_found',
  SESSION_NOT_FOUND: 'not_found',
  LINK_NOT_FOUND: 'not_found',
  STUDENT_NOT_FOUND: 'not_found',
  RECORD_NOT_FOUND: 'not_found',
  NOT_FOUND: 'not_found',
  INVALID_PASSWORD: 'unauthorized',
  INVALID_CREDENTIALS: 'unauthorized',
  CURRENT_PASSWORD_INCORRECT: 'unauthorized',
  TWO_FACTOR_REQUIRED: 'unauthorized',
  INVALID_TWO_FACTOR: 'unauthorized',
  UNAUTHORIZED: 'unauthorized',
  USERNAME_TAKEN: 'conflict',
  EMAIL_TAKEN: 'conflict',
  ALREADY_MARKED: 'conflict',
  ACCOUNT_LOCKED: 'state',
  ACCOUNT_INACTIVE: 'state',
  PROTECTED_ACCOUNT: 'state',
  TOKEN_EXPIRED: 'state',
  TOKEN_INACTIVE: 'state',
  USAGE_EXCEEDED: 'state',
  FORBIDDEN: 'state',
  STORAGE_ERROR: 'storage',
};

export function ok<T>(data: T, message: string): ServiceResult<T> {
  return { ok: true, data, message };
}

export function fail(code: ErrorCode, message: string = ERRORS[code], details?: string[]): Failure {
  const error: ServiceError = { kind: KINDS[code], code, message };
  if (details) error.details = details;
  return { ok: false, error };
}

/**
 * Runs a service operation, turning a store failure into a STORAGE_ERROR
 * result. Anything that is not a StorageError is a bug and propagates.
 */
export async function withStorage<T>(
  operation: string,
  task: () => Promise<ServiceResult<T>>,
): Promise<ServiceResult<T>> {
  try {
    return await task();
  } catch (err) {
    if (!(err instanceof StorageError)) throw err;
    console.warn(`${operation} failed: ${err.message}`);
    return fail('STORAGE_ERROR', `${ERRORS.STORAGE_ERROR}: ${err.message}`);
  }
}
