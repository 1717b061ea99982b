import type {
  AttendanceQuery,
  AttendanceRecord,
  AttendanceStatus,
  ServiceResult,
} from '@rollcall/shared';
import { DuplicateKeyError, type DocumentCollection, type Filter } from '../store/index.js';
import { isCalendarDate, localDate, localTime } from '../utils/time.js';
import { fail, ok, withStorage } from './results.js';

export interface MarkInput {
  studentId: string;
  // Anything truthy counts as present; omitted means present.
  status?: number | boolean;
  when?: Date;
  course?: string | null;
  method: string;
  // Who the record is attributed to: the signed-in user, or the issuer of the
  // link an anonymous student used.
  actor: string;
}

export function coerceStatus(value: number | boolean | undefined): AttendanceStatus {
  if (value === undefined) return 1;
  return value ? 1 : 0;
}

function byDateThenTime(a: AttendanceRecord, b: AttendanceRecord): number {
  return a.date.localeCompare(b.date) || a.time.localeCompare(b.time) || a.studentId.localeCompare(b.studentId);
}

/**
 * Owns the one-record-per-student-per-day rule. The existence check avoids a
 * pointless write; the store's key on (studentId, date) is what settles a race.
 */
export class AttendanceLedger {
  constructor(private readonly records: DocumentCollection<AttendanceRecord>) {}

  markAttendance(input: MarkInput): Promise<ServiceResult<AttendanceRecord>> {
    return withStorage('markAttendance', async () => {
      const studentId = input.studentId.trim();
      if (!studentId) return fail('INVALID_REQUEST', 'Student ID is required');

      const when = input.when ?? new Date();
      const date = localDate(when);
      if (await this.records.findOne({ studentId, date })) return fail('ALREADY_MARKED');

      const record: AttendanceRecord = {
        studentId,
        date,
        time: localTime(when),
        ts: when.toISOString(),
        status: coerceStatus(input.status),
        course: input.course?.trim() || null,
        method: input.method,
        createdBy: input.actor,
        updatedBy: null,
        updatedAt: null,
      };
      try {
        await this.records.insertOne(record);
      } catch (err) {
        if (err instanceof DuplicateKeyError) return fail('ALREADY_MARKED');
        throw err;
      }
      return ok(record, `Attendance marked for ${studentId}`);
    });
  }

  // Edits the status of an existing record; the (studentId, date) key never changes.
  updateStatus(
    studentId: string,
    date: string,
    status: number | boolean,
    actor: string,
  ): Promise<ServiceResult<AttendanceRecord>> {
    return withStorage('updateStatus', async () => {
      if (!isCalendarDate(date)) return fail('INVALID_DATE');
      const updated = await this.records.updateOne(
        { studentId, date },
        { $set: { status: coerceStatus(status), updatedBy: actor, updatedAt: new Date().toISOString() } },
      );
      if (!updated) return fail('RECORD_NOT_FOUND');
      return ok(updated, 'Attendance updated');
    });
  }

  listRecords(query: AttendanceQuery = {}): Promise<ServiceResult<AttendanceRecord[]>> {
    return withStorage('listRecords', async () => {
      const { from, to, course, createdBy } = query;
      if ((from && !isCalendarDate(from)) || (to && !isCalendarDate(to))) return fail('INVALID_DATE');

      const filter: Filter<AttendanceRecord> = {};
      if (from || to) filter.date = { $gte: from, $lte: to };
      if (course) filter.course = course;
      if (createdBy) filter.createdBy = createdBy;

      const records = await this.records.find(filter);
      return ok(records.sort(byDateThenTime), `${records.length} records`);
    });
  }

  countRecords(createdBy?: string): Promise<ServiceResult<number>> {
    return withStorage('countRecords', async () => {
      const count = await this.records.countDocuments(createdBy ? { createdBy } : {});
      return ok(count, `${count} records`);
    });
  }
}
