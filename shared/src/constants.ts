// API path prefixes
export const API_PATHS = {
  HEALTH: '/health',
  AUTH_SIGNUP: '/auth/signup',
  AUTH_LOGIN: '/auth/login',
  AUTH_CHANGE_PASSWORD: '/auth/change-password',
  AUTH_FORGOT_PASSWORD: '/auth/forgot-password',
  AUTH_RESET_PASSWORD: '/auth/reset-password',
  ATTEND: '/attend',
  SESSIONS: '/sessions',
  SESSIONS_DEACTIVATE: '/sessions/deactivate',
  LINKS: '/links',
  LINKS_MAX_USES: '/links/max-uses',
  LINKS_DEACTIVATE: '/links/deactivate',
  ATTENDANCE: '/attendance',
  ATTENDANCE_STATUS: '/attendance/status',
  ADMIN_USERS: '/admin/users',
  ADMIN_USERS_STATUS: '/admin/users/status',
  ADMIN_USERS_ROLE: '/admin/users/role',
  ADMIN_USERS_UNLOCK: '/admin/users/unlock',
  ADMIN_USERS_RESET_TOKEN: '/admin/users/reset-token',
  ADMIN_USERS_DELETE: '/admin/users/delete',
} as const;

// Query parameters that route anonymous requests into token flows
export const QUERY_PARAMS = {
  SESSION: 'session',
  STUDENT_LINK: 'student_link',
  RESET_TOKEN: 'reset_token',
} as const;

// Collection names as persisted
export const COLLECTIONS = {
  USERS: 'users',
  ATTENDANCE: 'attendance',
  SESSIONS: 'attendance_sessions',
  LINKS: 'attendance_links',
  STUDENTS: 'students',
} as const;

// Provenance tags written to AttendanceRecord.method
export const ATTENDANCE_METHODS = {
  MANUAL: 'manual_entry',
  CAMERA: 'camera_scan',
  BULK: 'bulk_entry',
  SESSION_LINK: 'session_link',
  PERSONAL_LINK: 'personal_link',
} as const;

// Error messages, keyed by the code services report
export const ERRORS = {
  INVALID_REQUEST: 'Invalid request',
  INVALID_USERNAME: 'Username must be at least 3 characters',
  INVALID_EMAIL: 'Invalid email format',
  EMPTY_PASSWORD: 'Password cannot be empty',
  TOO_SHORT: 'Password must be at least 8 characters',
  WEAK_PASSWORD:
    'Password must contain at least one uppercase letter, one lowercase letter, one number, and one special character',
  USERNAME_TAKEN: 'Username already exists',
  EMAIL_TAKEN: 'Email already exists',
  USER_NOT_FOUND: 'User not found',
  INVALID_PASSWORD: 'Invalid password',
  INVALID_CREDENTIALS: 'Invalid username or password',
  CURRENT_PASSWORD_INCORRECT: 'Current password is incorrect',
  ACCOUNT_LOCKED: 'Account locked',
  ACCOUNT_INACTIVE: 'Account is inactive',
  TWO_FACTOR_REQUIRED: 'Two-factor code required',
  INVALID_TWO_FACTOR: 'Invalid two-factor code',
  INVALID_OR_EXPIRED_TOKEN: 'Invalid or expired reset token',
  PROTECTED_ACCOUNT: 'The built-in admin account cannot be deleted',
  INVALID_DURATION: 'Duration is outside the allowed range',
  INVALID_MAX_USES: 'Max uses must be a positive whole number',
  SESSION_NOT_FOUND: 'Invalid or expired attendance session',
  LINK_NOT_FOUND: 'Invalid or expired attendance link',
  STUDENT_NOT_FOUND: 'Student ID not found. Please contact your teacher.',
  TOKEN_EXPIRED: 'This link has expired',
  TOKEN_INACTIVE: 'This link is no longer active',
  USAGE_EXCEEDED: 'This attendance link has reached its usage limit',
  ALREADY_MARKED: 'Attendance already marked for today',
  RECORD_NOT_FOUND: 'Attendance record not found',
  INVALID_DATE: 'Date must be formatted YYYY-MM-DD',
  STORAGE_ERROR: 'Storage unavailable',
  UNAUTHORIZED: 'Unauthorized',
  FORBIDDEN: 'Forbidden',
  NOT_FOUND: 'Not found',
} as const;

export type ErrorCode = keyof typeof ERRORS;

// Limits
export const LIMITS = {
  USERNAME_MIN_LENGTH: 3,
  USERNAME_MAX_LENGTH: 64,
  MAX_PASSWORD_LENGTH: 1024,
  MAX_LOGIN_ATTEMPTS: 5,
  LOCKOUT_MINUTES: 30,
  RESET_TOKEN_TTL_HOURS: 24,
  TOKEN_LENGTH: 32,
} as const;

export const ACCESS_LIMITS = {
  SESSION_DEFAULT_HOURS: 24,
  SESSION_MAX_HOURS: 168,
  LINK_DEFAULT_HOURS: 168,
  LINK_MAX_HOURS: 720,
  MIN_HOURS: 1,
  STUDENT_ID_MAX_LENGTH: 64,
} as const;

// Hidden decoy fields rendered by public forms
export const HONEYPOT_FIELDS = ['website', 'phone', 'nickname'] as const;
