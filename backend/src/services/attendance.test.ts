import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createJsonFileStore } from '../store/json-file.js';
import type { Store } from '../store/index.js';
import { AttendanceLedger, coerceStatus } from './attendance.js';

// Local wall-clock times, so the stored date and time do not depend on the zone.
const MORNING = new Date(2024, 2, 5, 9, 41, 7);
const NEXT_DAY = new Date(2024, 2, 6, 8, 15, 0);

let dataDir: string;
let store: Store;
let ledger: AttendanceLedger;

beforeEach(async () => {
  dataDir = await mkdtemp(join(tmpdir(), 'rollcall-attendance-'));
  store = createJsonFileStore(dataDir);
  ledger = new AttendanceLedger(store.attendance);
});

afterEach(async () => {
  vi.useRealTimers();
  await rm(dataDir, { recursive: true, force: true });
});

describe('coerceStatus', () => {
  it('treats omitted and truthy values as present', () => {
    expect(coerceStatus(undefined)).toBe(1);
    expect(coerceStatus(true)).toBe(1);
    expect(coerceStatus(2)).toBe(1);
    expect(coerceStatus(false)).toBe(0);
    expect(coerceStatus(0)).toBe(0);
  });
});

describe('markAttendance', () => {
  it('records the local date and time of the mark', async () => {
    const result = await ledger.markAttendance({
      studentId: ' S1 ',
      when: MORNING,
      course: ' CS101 ',
      method: 'manual_entry',
      actor: 'alice',
    });

    expect(result).toEqual({
      ok: true,
      data: {
        studentId: 'S1',
        date: '2024-03-05',
        time: '09:41:07',
        ts: MORNING.toISOString(),
        status: 1,
        course: 'CS101',
        method: 'manual_entry',
        createdBy: 'alice',
        updatedBy: null,
        updatedAt: null,
      },
      message: 'Attendance marked for S1',
    });
  });

  it('stores a blank course as null and coerces the status', async () => {
    const result = await ledger.markAttendance({
      studentId: 'S1',
      status: false,
      when: MORNING,
      course: '  ',
      method: 'bulk_entry',
      actor: 'alice',
    });
    expect(result).toMatchObject({ ok: true, data: { course: null, status: 0 } });
  });

  it('requires a student id', async () => {
    await expect(ledger.markAttendance({ studentId: '  ', method: 'manual_entry', actor: 'alice' })).resolves.toEqual({
      ok: false,
      error: { kind: 'validation', code: 'INVALID_REQUEST', message: 'Student ID is required' },
    });
  });

  it('allows one record per student per day', async () => {
    const mark = (when: Date) => ledger.markAttendance({ studentId: 'S1', when, method: 'manual_entry', actor: 'alice' });

    await expect(mark(MORNING)).resolves.toMatchObject({ ok: true });
    await expect(mark(new Date(2024, 2, 5, 15, 0, 0))).resolves.toEqual({
      ok: false,
      error: { kind: 'conflict', code: 'ALREADY_MARKED', message: 'Attendance already marked for today' },
    });
    await expect(mark(NEXT_DAY)).resolves.toMatchObject({ ok: true });
  });

  it('accepts exactly one of several concurrent marks', async () => {
    const results = await Promise.all(
      Array.from({ length: 5 }, (_, i) =>
        ledger.markAttendance({ studentId: 'S1', when: MORNING, method: 'session_link', actor: `teacher${i}` }),
      ),
    );

    expect(results.filter((r) => r.ok)).toHaveLength(1);
    expect(results.filter((r) => !r.ok && r.error.code === 'ALREADY_MARKED')).toHaveLength(4);
    await expect(store.attendance.countDocuments()).resolves.toBe(1);
  });
});

describe('updateStatus', () => {
  beforeEach(async () => {
    await ledger.markAttendance({ studentId: 'S1', when: MORNING, method: 'manual_entry', actor: 'alice' });
  });

  it('edits the status and records who changed it', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2024-03-05T12:00:00.000Z'));

    await expect(ledger.updateStatus('S1', '2024-03-05', 0, 'bob')).resolves.toMatchObject({
      ok: true,
      data: { studentId: 'S1', date: '2024-03-05', status: 0, updatedBy: 'bob', updatedAt: '2024-03-05T12:00:00.000Z' },
      message: 'Attendance updated',
    });
  });

  it('rejects malformed dates', async () => {
    await expect(ledger.updateStatus('S1', '05/03/2024', 1, 'bob')).resolves.toMatchObject({
      ok: false,
      error: { code: 'INVALID_DATE' },
    });
  });

  it('reports a missing record', async () => {
    await expect(ledger.updateStatus('S2', '2024-03-05', 1, 'bob')).resolves.toMatchObject({
      ok: false,
      error: { code: 'RECORD_NOT_FOUND', kind: 'not_found' },
    });
  });
});

describe('listRecords', () => {
  beforeEach(async () => {
    await ledger.markAttendance({ studentId: 'S2', when: NEXT_DAY, course: 'CS101', method: 'manual_entry', actor: 'alice' });
    await ledger.markAttendance({ studentId: 'S2', when: MORNING, course: 'CS101', method: 'manual_entry', actor: 'alice' });
    await ledger.markAttendance({ studentId: 'S1', when: MORNING, course: 'MA201', method: 'manual_entry', actor: 'bob' });
  });

  it('sorts by date, time and student', async () => {
    const result = await ledger.listRecords();
    expect(result).toMatchObject({ ok: true, message: '3 records' });
    if (!result.ok) return;
    expect(result.data.map((r) => `${r.date} ${r.studentId}`)).toEqual([
      '2024-03-05 S1',
      '2024-03-05 S2',
      '2024-03-06 S2',
    ]);
  });

  it('filters by date range, course and issuer', async () => {
    const ranged = await ledger.listRecords({ from: '2024-03-06' });
    if (!ranged.ok) throw new Error(ranged.error.message);
    expect(ranged.data).toHaveLength(1);

    const upTo = await ledger.listRecords({ to: '2024-03-05', course: 'CS101' });
    if (!upTo.ok) throw new Error(upTo.error.message);
    expect(upTo.data.map((r) => r.studentId)).toEqual(['S2']);

    await expect(ledger.countRecords('bob')).resolves.toEqual({ ok: true, data: 1, message: '1 records' });
    await expect(ledger.countRecords()).resolves.toMatchObject({ data: 3 });
  });

  it('rejects malformed range bounds', async () => {
    await expect(ledger.listRecords({ from: 'yesterday' })).resolves.toMatchObject({
      ok: false,
      error: { code: 'INVALID_DATE' },
    });
  });
});
