import { isComparison } from './filter.js';
import type { Comparison, Filter, Update } from './types.js';

const COMPARATORS: Record<keyof Comparison, string> = {
  $gt: '>',
  $gte: '>=',
  $lt: '<',
  $lte: '<=',
  $ne: '<>',
};

function isComparator(op: string): op is keyof Comparison {
  return Object.hasOwn(COMPARATORS, op);
}

/**
 * Collects DynamoDB expression placeholders while a condition or update
 * expression is rendered. Every field goes through a `#name` placeholder so
 * reserved words (`name`, `status`, `date`, `ttl`) need no special casing.
 */
export class ExpressionBuilder {
  private readonly names: Record<string, string> = {};
  private readonly values: Record<string, unknown> = {};
  private counter = 0;

  name(field: string): string {
    const placeholder = `#${field}`;
    this.names[placeholder] = field;
    return placeholder;
  }

  value(value: unknown): string {
    const placeholder = `:v${this.counter++}`;
    this.values[placeholder] = value;
    return placeholder;
  }

  // Renders `filter` as an AND of clauses, skipping the fields in `omit`.
  condition<T>(filter: Filter<T>, omit: string[] = []): string | undefined {
    const clauses: string[] = [];
    for (const [field, expected] of Object.entries(filter)) {
      if (expected === undefined || omit.includes(field)) continue;
      const name = this.name(field);
      if (isComparison(expected)) {
        for (const [op, operand] of Object.entries(expected)) {
          if (operand === undefined || !isComparator(op)) continue;
          clauses.push(`${name} ${COMPARATORS[op]} ${this.value(operand)}`);
        }
      } else if (expected === null) {
        clauses.push(`(attribute_not_exists(${name}) OR ${name} = ${this.value(null)})`);
      } else {
        clauses.push(`${name} = ${this.value(expected)}`);
      }
    }
    return clauses.length > 0 ? clauses.join(' AND ') : undefined;
  }

  // Null assignments become REMOVE: index key attributes may not hold NULL.
  update<T>(update: Update<T>): string | undefined {
    const assigned = Object.entries(update.$set ?? {}).filter(([, value]) => value !== undefined);
    const sets = assigned
      .filter(([, value]) => value !== null)
      .map(([field, value]) => `${this.name(field)} = ${this.value(value)}`);
    const removes = assigned.filter(([, value]) => value === null).map(([field]) => this.name(field));
    const adds = Object.entries(update.$inc ?? {})
      .filter(([, by]) => typeof by === 'number')
      .map(([field, by]) => `${this.name(field)} ${this.value(by)}`);

    const parts: string[] = [];
    if (sets.length > 0) parts.push(`SET ${sets.join(', ')}`);
    if (removes.length > 0) parts.push(`REMOVE ${removes.join(', ')}`);
    if (adds.length > 0) parts.push(`ADD ${adds.join(', ')}`);
    return parts.length > 0 ? parts.join(' ') : undefined;
  }

  attributeNames(): Record<string, string> | undefined {
    return Object.keys(this.names).length > 0 ? this.names : undefined;
  }

  attributeValues(): Record<string, unknown> | undefined {
    return Object.keys(this.values).length > 0 ? this.values : undefined;
  }
}

export function joinConditions(...conditions: Array<string | undefined>): string | undefined {
  const present = conditions.filter((c): c is string => c !== undefined);
  return present.length > 0 ? present.join(' AND ') : undefined;
}
