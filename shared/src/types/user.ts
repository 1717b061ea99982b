export type UserRole = 'teacher' | 'admin';

// 'pending' exists for accounts imported from older deployments; signup and
// admin-add create accounts as 'active'.
export type UserStatus = 'pending' | 'active' | 'inactive';

export interface User {
  username: string;
  passwordHash: string;
  email: string;
  name: string;
  role: UserRole;
  status: UserStatus;
  failedAttempts: number;
  isLocked: boolean;
  lockoutUntil: string | null;
  lastLogin: string | null;
  passwordResetToken: string | null;
  passwordResetExpires: string | null;
  twoFactorEnabled: boolean;
  createdAt: string;
  lastModified: string | null;
}

export interface UserProfile {
  username: string;
  role: UserRole;
  name: string;
  email: string;
}
