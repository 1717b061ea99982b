export interface AttendanceSession {
  sessionId: string;
  course: string | null;
  description: string;
  createdBy: string;
  createdAt: string;
  expiresAt: string;
  isActive: boolean;
  attendanceCount: number;
  // Epoch seconds, read by DynamoDB's native TTL.
  ttl: number;
}

export interface PersonalLink {
  linkId: string;
  studentId: string;
  course: string | null;
  createdBy: string;
  createdAt: string;
  expiresAt: string;
  isActive: boolean;
  uses: number;
  maxUses: number | null;
  ttl: number;
}

export interface CreateSessionRequest {
  description: string;
  course?: string | null;
  durationHours?: number;
}

export interface CreateSessionResponse {
  sessionId: string;
  expiresAt: string;
  shareUrl: string;
}

export interface CreateLinkRequest {
  studentId: string;
  course?: string | null;
  durationHours?: number;
  maxUses?: number | null;
}

export interface CreateLinkResponse {
  linkId: string;
  expiresAt: string;
  maxUses: number | null;
  shareUrl: string;
}

export interface SetMaxUsesRequest {
  linkId: string;
  maxUses: number | null;
}

export interface SessionMarkRequest {
  studentId: string;
}

export interface IssuedToken {
  id: string;
  expiresAt: string;
}

export interface SweepResult {
  sessionsDeleted: number;
  linksDeleted: number;
}
