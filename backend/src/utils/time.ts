const HOUR_MS = 60 * 60 * 1000;

export function addHours(from: Date, hours: number): Date {
  return new Date(from.getTime() + hours * HOUR_MS);
}

export function addMinutes(from: Date, minutes: number): Date {
  return new Date(from.getTime() + minutes * 60 * 1000);
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

// Calendar date in the server's local time zone, e.g. 2024-03-05.
export function localDate(when: Date): string {
  return `${when.getFullYear()}-${pad(when.getMonth() + 1)}-${pad(when.getDate())}`;
}

// Wall-clock time in the server's local time zone, e.g. 09:41:07.
export function localTime(when: Date): string {
  return `${pad(when.getHours())}:${pad(when.getMinutes())}:${pad(when.getSeconds())}`;
}

export function toEpochSeconds(when: Date): number {
  return Math.floor(when.getTime() / 1000);
}

// True once `iso` is at or before `now`.
export function hasElapsed(iso: string, now: Date = new Date()): boolean {
  return Date.parse(iso) <= now.getTime();
}

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function isCalendarDate(value: string): boolean {
  return DATE_PATTERN.test(value) && !Number.isNaN(Date.parse(value));
}
