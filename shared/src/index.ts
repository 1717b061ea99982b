export * from './constants.js';
export * from './config/crypto-params.js';
export * from './config/environments.js';
export * from './config/password-policy.js';
export type * from './types/access.js';
export type * from './types/admin.js';
export type * from './types/api.js';
export type * from './types/attendance.js';
export type * from './types/auth.js';
export type * from './types/environment.js';
export type * from './types/user.js';
