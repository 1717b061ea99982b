import {
  ACCESS_LIMITS,
  ATTENDANCE_METHODS,
  type AttendanceRecord,
  type AttendanceSession,
  type CreateLinkRequest,
  type CreateSessionRequest,
  type IssuedToken,
  type PersonalLink,
  type ServiceResult,
  type Student,
  type SweepResult,
} from '@rollcall/shared';
import { StorageError, type DocumentCollection } from '../store/index.js';
import { generateToken } from '../utils/crypto.js';
import { addHours, hasElapsed, toEpochSeconds } from '../utils/time.js';
import type { AttendanceLedger } from './attendance.js';
import type { StudentDirectory } from './students.js';
import { fail, ok, withStorage, type Failure } from './results.js';

function durationFailure(hours: number, max: number): Failure | null {
  if (!Number.isFinite(hours) || hours < ACCESS_LIMITS.MIN_HOURS || hours > max) {
    return fail('INVALID_DURATION', `Duration must be between ${ACCESS_LIMITS.MIN_HOURS} and ${max} hours`);
  }
  return null;
}

function isValidMaxUses(maxUses: number | null): boolean {
  return maxUses === null || (Number.isInteger(maxUses) && maxUses > 0);
}

/**
 * Issues and redeems the two kinds of URL-carried grants: class-wide session
 * links and single-student personal links. Expiry is judged against the clock
 * on every use; physical deletion (TTL or sweepExpired) is housekeeping only.
 */
export class AccessIssuer {
  constructor(
    private readonly sessions: DocumentCollection<AttendanceSession>,
    private readonly links: DocumentCollection<PersonalLink>,
    private readonly ledger: AttendanceLedger,
    private readonly students: StudentDirectory,
  ) {}

  createSession(request: CreateSessionRequest, issuedBy: string): Promise<ServiceResult<IssuedToken>> {
    return withStorage('createSession', async () => {
      const description = request.description.trim();
      if (!description) return fail('INVALID_REQUEST', 'Description is required');
      const hours = request.durationHours ?? ACCESS_LIMITS.SESSION_DEFAULT_HOURS;
      const invalid = durationFailure(hours, ACCESS_LIMITS.SESSION_MAX_HOURS);
      if (invalid) return invalid;

      const now = new Date();
      const expires = addHours(now, hours);
      const session: AttendanceSession = {
        sessionId: generateToken(),
        course: request.course?.trim() || null,
        description,
        createdBy: issuedBy,
        createdAt: now.toISOString(),
        expiresAt: expires.toISOString(),
        isActive: true,
        attendanceCount: 0,
        ttl: toEpochSeconds(expires),
      };
      await this.sessions.insertOne(session);
      return ok({ id: session.sessionId, expiresAt: session.expiresAt }, 'Attendance session created');
    });
  }

  // Links start without a usage cap; setLinkMaxUses adds one.
  createPersonalLink(request: CreateLinkRequest, issuedBy: string): Promise<ServiceResult<IssuedToken>> {
    return withStorage('createPersonalLink', async () => {
      const studentId = request.studentId.trim();
      if (!studentId) return fail('INVALID_REQUEST', 'Student ID is required');
      const hours = request.durationHours ?? ACCESS_LIMITS.LINK_DEFAULT_HOURS;
      const invalid = durationFailure(hours, ACCESS_LIMITS.LINK_MAX_HOURS);
      if (invalid) return invalid;

      const now = new Date();
      const expires = addHours(now, hours);
      const link: PersonalLink = {
        linkId: generateToken(),
        studentId,
        course: request.course?.trim() || null,
        createdBy: issuedBy,
        createdAt: now.toISOString(),
        expiresAt: expires.toISOString(),
        isActive: true,
        uses: 0,
        maxUses: null,
        ttl: toEpochSeconds(expires),
      };
      await this.links.insertOne(link);
      return ok({ id: link.linkId, expiresAt: link.expiresAt }, 'Personal link created');
    });
  }

  setLinkMaxUses(linkId: string, maxUses: number | null, owner?: string): Promise<ServiceResult<PersonalLink>> {
    return withStorage('setLinkMaxUses', async () => {
      if (!isValidMaxUses(maxUses)) return fail('INVALID_MAX_USES');
      const updated = await this.links.updateOne({ linkId, createdBy: owner }, { $set: { maxUses } });
      if (!updated) return fail('LINK_NOT_FOUND');
      return ok(updated, maxUses === null ? 'Usage limit removed' : `Usage limit set to ${maxUses}`);
    });
  }

  resolveSession(sessionId: string): Promise<ServiceResult<AttendanceSession>> {
    return withStorage('resolveSession', async () => {
      if (!sessionId) return fail('SESSION_NOT_FOUND');
      const session = await this.sessions.findOne({ sessionId });
      if (!session) return fail('SESSION_NOT_FOUND');
      if (hasElapsed(session.expiresAt)) return fail('TOKEN_EXPIRED');
      if (!session.isActive) return fail('TOKEN_INACTIVE');
      return ok(session, 'Session valid');
    });
  }

  resolvePersonalLink(linkId: string): Promise<ServiceResult<PersonalLink>> {
    return withStorage('resolvePersonalLink', async () => {
      if (!linkId) return fail('LINK_NOT_FOUND');
      const link = await this.links.findOne({ linkId });
      if (!link) return fail('LINK_NOT_FOUND');
      if (hasElapsed(link.expiresAt)) return fail('TOKEN_EXPIRED');
      if (!link.isActive) return fail('TOKEN_INACTIVE');
      if (link.maxUses !== null && link.uses >= link.maxUses) return fail('USAGE_EXCEEDED');
      return ok(link, 'Link valid');
    });
  }

  async markViaSession(sessionId: string, studentId: string): Promise<ServiceResult<AttendanceRecord>> {
    const resolved = await this.resolveSession(sessionId);
    if (!resolved.ok) return resolved;
    const session = resolved.data;

    const known = await this.findStudent('markViaSession', studentId);
    if (!known.ok) return known;

    const marked = await this.ledger.markAttendance({
      studentId: known.data.studentId,
      course: session.course,
      method: ATTENDANCE_METHODS.SESSION_LINK,
      actor: session.createdBy,
    });
    if (!marked.ok) return marked;

    await this.countUse('markViaSession', () =>
      this.sessions.updateOne({ sessionId }, { $inc: { attendanceCount: 1 } }),
    );
    return marked;
  }

  async markViaLink(linkId: string): Promise<ServiceResult<AttendanceRecord>> {
    const resolved = await this.resolvePersonalLink(linkId);
    if (!resolved.ok) return resolved;
    const link = resolved.data;

    const known = await this.findStudent('markViaLink', link.studentId);
    if (!known.ok) return known;

    const marked = await this.ledger.markAttendance({
      studentId: link.studentId,
      course: link.course,
      method: ATTENDANCE_METHODS.PERSONAL_LINK,
      actor: link.createdBy,
    });
    if (!marked.ok) return marked;

    await this.countUse('markViaLink', () => this.links.updateOne({ linkId }, { $inc: { uses: 1 } }));
    return marked;
  }

  private findStudent(operation: string, studentId: string): Promise<ServiceResult<Student>> {
    return withStorage(operation, async () => {
      const id = studentId.trim();
      if (!id || id.length > ACCESS_LIMITS.STUDENT_ID_MAX_LENGTH) return fail('STUDENT_NOT_FOUND');
      const student = await this.students.find(id);
      if (!student) return fail('STUDENT_NOT_FOUND');
      return ok(student, 'Student found');
    });
  }

  // The record is already written; a failed counter bump is logged, not reported.
  private async countUse(operation: string, increment: () => Promise<unknown>): Promise<void> {
    try {
      await increment();
    } catch (err) {
      if (!(err instanceof StorageError)) throw err;
      console.warn(`${operation}: attendance recorded but usage counter not updated: ${err.message}`);
    }
  }

  deactivateSession(sessionId: string, owner?: string): Promise<ServiceResult<null>> {
    return withStorage('deactivateSession', async () => {
      const updated = await this.sessions.updateOne({ sessionId, createdBy: owner }, { $set: { isActive: false } });
      if (!updated) return fail('SESSION_NOT_FOUND');
      return ok(null, 'Session deactivated');
    });
  }

  deactivateLink(linkId: string, owner?: string): Promise<ServiceResult<null>> {
    return withStorage('deactivateLink', async () => {
      const updated = await this.links.updateOne({ linkId, createdBy: owner }, { $set: { isActive: false } });
      if (!updated) return fail('LINK_NOT_FOUND');
      return ok(null, 'Link deactivated');
    });
  }

  // Sessions that can still be used, newest first. `owner` narrows to one issuer.
  listActiveSessions(owner?: string): Promise<ServiceResult<AttendanceSession[]>> {
    return withStorage('listActiveSessions', async () => {
      const sessions = await this.sessions.find({
        createdBy: owner,
        isActive: true,
        expiresAt: { $gt: new Date().toISOString() },
      });
      sessions.sort((a, b) => b.createdAt.localeCompare(a.createdAt));
      return ok(sessions, `${sessions.length} active sessions`);
    });
  }

  listActiveLinks(owner?: string): Promise<ServiceResult<PersonalLink[]>> {
    return withStorage('listActiveLinks', async () => {
      const links = await this.links.find({
        createdBy: owner,
        isActive: true,
        expiresAt: { $gt: new Date().toISOString() },
      });
      links.sort((a, b) => b.createdAt.localeCompare(a.createdAt));
      return ok(links, `${links.length} active links`);
    });
  }

  // Physically removes expired grants. Safe to run any number of times.
  sweepExpired(): Promise<ServiceResult<SweepResult>> {
    return withStorage('sweepExpired', async () => {
      const cutoff = { $lte: new Date().toISOString() };
      const sessionsDeleted = await this.sessions.deleteMany({ expiresAt: cutoff });
      const linksDeleted = await this.links.deleteMany({ expiresAt: cutoff });
      if (sessionsDeleted + linksDeleted > 0) {
        console.info(`Swept ${sessionsDeleted} expired sessions and ${linksDeleted} expired links`);
      }
      return ok({ sessionsDeleted, linksDeleted }, 'Expired access tokens removed');
    });
  }
}
