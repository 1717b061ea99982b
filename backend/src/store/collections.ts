import { z } from 'zod';
import {
  COLLECTIONS,
  type AttendanceRecord,
  type AttendanceSession,
  type PersonalLink,
  type Student,
  type User,
} from '@rollcall/shared';
import type { CollectionDefinition } from './types.js';

const nullableString = z.string().nullable();

export const userSchema: z.ZodType<User> = z.object({
  username: z.string(),
  passwordHash: z.string(),
  email: z.string(),
  name: z.string().default(''),
  role: z.enum(['teacher', 'admin']),
  status: z.enum(['pending', 'active', 'inactive']),
  failedAttempts: z.number().int().nonnegative().default(0),
  isLocked: z.boolean().default(false),
  lockoutUntil: nullableString.default(null),
  lastLogin: nullableString.default(null),
  passwordResetToken: nullableString.default(null),
  passwordResetExpires: nullableString.default(null),
  twoFactorEnabled: z.boolean().default(false),
  createdAt: z.string(),
  lastModified: nullableString.default(null),
});

export const attendanceSchema: z.ZodType<AttendanceRecord> = z.object({
  studentId: z.string(),
  date: z.string(),
  time: z.string(),
  ts: z.string(),
  status: z.union([z.literal(0), z.literal(1)]),
  course: nullableString.default(null),
  method: z.string(),
  createdBy: z.string(),
  updatedBy: nullableString.default(null),
  updatedAt: nullableString.default(null),
});

export const sessionSchema: z.ZodType<AttendanceSession> = z.object({
  sessionId: z.string(),
  course: nullableString.default(null),
  description: z.string(),
  createdBy: z.string(),
  createdAt: z.string(),
  expiresAt: z.string(),
  isActive: z.boolean().default(true),
  attendanceCount: z.number().int().nonnegative().default(0),
  ttl: z.number().int(),
});

export const linkSchema: z.ZodType<PersonalLink> = z.object({
  linkId: z.string(),
  studentId: z.string(),
  course: nullableString.default(null),
  createdBy: z.string(),
  createdAt: z.string(),
  expiresAt: z.string(),
  isActive: z.boolean().default(true),
  uses: z.number().int().nonnegative().default(0),
  maxUses: z.number().int().positive().nullable().default(null),
  ttl: z.number().int(),
});

export const studentSchema: z.ZodType<Student> = z.object({
  studentId: z.string(),
  name: z.string().default(''),
  course: nullableString.default(null),
});

export const usersCollection: CollectionDefinition<User> = {
  name: COLLECTIONS.USERS,
  schema: userSchema,
  partitionKey: 'username',
  unique: ['email', 'passwordResetToken'],
  indexes: {
    email: 'email-index',
    passwordResetToken: 'reset-token-index',
  },
};

// (studentId, date) is the table key, so one record per student per day is
// enforced by the store itself.
export const attendanceCollection: CollectionDefinition<AttendanceRecord> = {
  name: COLLECTIONS.ATTENDANCE,
  schema: attendanceSchema,
  partitionKey: 'studentId',
  sortKey: 'date',
  unique: [],
  indexes: {
    createdBy: 'created-by-index',
  },
};

export const sessionsCollection: CollectionDefinition<AttendanceSession> = {
  name: COLLECTIONS.SESSIONS,
  schema: sessionSchema,
  partitionKey: 'sessionId',
  unique: [],
  indexes: {
    createdBy: 'created-by-index',
  },
};

export const linksCollection: CollectionDefinition<PersonalLink> = {
  name: COLLECTIONS.LINKS,
  schema: linkSchema,
  partitionKey: 'linkId',
  unique: [],
  indexes: {
    createdBy: 'created-by-index',
  },
};

export const studentsCollection: CollectionDefinition<Student> = {
  name: COLLECTIONS.STUDENTS,
  schema: studentSchema,
  partitionKey: 'studentId',
  unique: [],
  indexes: {},
};
