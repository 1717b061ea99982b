import type { z } from 'zod';
import type {
  AttendanceRecord,
  AttendanceSession,
  PersonalLink,
  StorageBackendName,
  Student,
  User,
} from '@rollcall/shared';

export type Scalar = string | number | boolean | null;

export interface Comparison {
  $gt?: Scalar;
  $gte?: Scalar;
  $lt?: Scalar;
  $lte?: Scalar;
  $ne?: Scalar;
}

// Field equality, or a comparison against the field. `null` matches both a
// null and a missing field.
export type Filter<T> = { [K in keyof T]?: T[K] | Comparison };

type NumericKeys<T> = { [K in keyof T]-?: T[K] extends number ? K : never }[keyof T];

export interface Update<T> {
  $set?: Partial<T>;
  $inc?: { [K in NumericKeys<T>]?: number };
}

/**
 * A schema-less collection of records in insertion order, keyed by
 * application-chosen fields. Both backends implement these six operations with
 * identical matching semantics.
 */
export interface DocumentCollection<T extends object> {
  readonly name: string;
  findOne(filter: Filter<T>): Promise<T | null>;
  find(filter?: Filter<T>): Promise<T[]>;
  // Throws DuplicateKeyError when a unique key is already taken.
  insertOne(doc: T): Promise<void>;
  // Applies the update to the first match and returns the updated record, or
  // null when nothing matched.
  updateOne(filter: Filter<T>, update: Update<T>): Promise<T | null>;
  deleteMany(filter: Filter<T>): Promise<number>;
  countDocuments(filter?: Filter<T>): Promise<number>;
}

export type FieldOf<T> = keyof T & string;

export interface CollectionDefinition<T extends object> {
  name: string;
  schema: z.ZodType<T>;
  partitionKey: FieldOf<T>;
  sortKey?: FieldOf<T>;
  // Secondary unique fields; null values are not indexed.
  unique: FieldOf<T>[];
  // Field → DynamoDB global secondary index name.
  indexes: Partial<Record<FieldOf<T>, string>>;
}

export interface Store {
  backend: StorageBackendName;
  users: DocumentCollection<User>;
  attendance: DocumentCollection<AttendanceRecord>;
  sessions: DocumentCollection<AttendanceSession>;
  links: DocumentCollection<PersonalLink>;
  students: DocumentCollection<Student>;
}
