import type { Comparison, Filter, Update } from './types.js';

const OPERATORS = new Set(['$gt', '$gte', '$lt', '$lte', '$ne']);

export function isComparison(value: unknown): value is Comparison {
  if (typeof value !== 'object' || value === null) return false;
  const keys = Object.keys(value);
  return keys.length > 0 && keys.every((key) => OPERATORS.has(key));
}

export function fieldsOf(doc: object): Map<string, unknown> {
  return new Map(Object.entries(doc));
}

function compare(a: unknown, b: unknown): number | null {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : a > b ? 1 : 0;
  return null;
}

function satisfies(actual: unknown, comparison: Comparison): boolean {
  for (const [op, operand] of Object.entries(comparison)) {
    if (operand === undefined) continue;
    if (op === '$ne') {
      if ((actual ?? null) === operand) return false;
      continue;
    }
    const order = compare(actual, operand);
    if (order === null) return false;
    if (op === '$gt' && !(order > 0)) return false;
    if (op === '$gte' && !(order >= 0)) return false;
    if (op === '$lt' && !(order < 0)) return false;
    if (op === '$lte' && !(order <= 0)) return false;
  }
  return true;
}

function matchesCondition(actual: unknown, expected: unknown): boolean {
  if (isComparison(expected)) return satisfies(actual, expected);
  if (expected === null) return actual === null || actual === undefined;
  return actual === expected;
}

export function matchesFilter<T extends object>(doc: T, filter: Filter<T> = {}): boolean {
  const fields = fieldsOf(doc);
  return Object.entries(filter).every(
    ([key, expected]) => expected === undefined || matchesCondition(fields.get(key), expected),
  );
}

export function applyUpdate<T extends object>(doc: T, update: Update<T>): T {
  const fields = fieldsOf(doc);
  const incremented: Record<string, number> = {};
  for (const [key, by] of Object.entries(update.$inc ?? {})) {
    if (typeof by !== 'number') continue;
    const current = fields.get(key);
    incremented[key] = (typeof current === 'number' ? current : 0) + by;
  }
  return { ...doc, ...update.$set, ...incremented };
}
