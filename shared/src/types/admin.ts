import type { UserRole, UserStatus } from './user.js';

export interface CreateUserRequest {
  username: string;
  password: string;
  email: string;
  name: string;
  role: UserRole;
}

export interface UserSummary {
  username: string;
  name: string;
  email: string;
  role: UserRole;
  status: UserStatus;
  failedAttempts: number;
  isLocked: boolean;
  createdAt: string;
  lastLogin: string | null;
}

export interface ListUsersResponse {
  users: UserSummary[];
}

export interface UsernameRequest {
  username: string;
}

export interface SetStatusRequest {
  username: string;
  status: UserStatus;
}

export interface SetRoleRequest {
  username: string;
  role: UserRole;
}

export interface ResetTokenResponse {
  username: string;
  resetUrl: string;
  expiresAt: string;
}
