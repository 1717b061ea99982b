export type AttendanceStatus = 0 | 1;

export interface AttendanceRecord {
  studentId: string;
  date: string;
  time: string;
  ts: string;
  status: AttendanceStatus;
  course: string | null;
  method: string;
  createdBy: string;
  updatedBy: string | null;
  updatedAt: string | null;
}

// A roster entry. The roster is maintained outside this service.
export interface Student {
  studentId: string;
  name: string;
  course: string | null;
}

export interface MarkAttendanceRequest {
  studentId: string;
  status?: number | boolean;
  course?: string | null;
  method?: string;
}

export interface UpdateStatusRequest {
  studentId: string;
  date: string;
  status: number | boolean;
}

export interface AttendanceQuery {
  from?: string;
  to?: string;
  course?: string;
  createdBy?: string;
}
