import type { ErrorCode } from '../constants.js';

export interface ApiResponse<T> {
  success: boolean;
  data?: T;
  message?: string;
  error?: string;
}

export interface ApiError {
  error: string;
  code?: ErrorCode;
  statusCode: number;
  details?: string[];
}

export type ErrorKind = 'validation' | 'unauthorized' | 'not_found' | 'conflict' | 'state' | 'storage';

export interface ServiceError {
  kind: ErrorKind;
  code: ErrorCode;
  message: string;
  details?: string[];
}

export type ServiceResult<T> =
  | { ok: true; data: T; message: string }
  | { ok: false; error: ServiceError };
