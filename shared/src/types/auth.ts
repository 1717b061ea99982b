import type { UserProfile, UserRole } from './user.js';

export interface SignupRequest {
  username: string;
  password: string;
  email: string;
  name: string;
}

export interface LoginRequest {
  username: string;
  password: string;
  twoFactorCode?: string;
}

export interface LoginResponse {
  token: string;
  expiresAt: string;
  profile: UserProfile;
}

export interface ChangePasswordRequest {
  currentPassword: string;
  newPassword: string;
}

export interface ForgotPasswordRequest {
  email: string;
}

export interface ForgotPasswordResponse {
  message: string;
  // Only populated where reset mail delivery is mocked.
  resetUrl?: string;
}

export interface ResetPasswordRequest {
  newPassword: string;
}

export interface SessionClaims {
  username: string;
  role: UserRole;
}
