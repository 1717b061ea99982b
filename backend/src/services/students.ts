import type { Student } from '@rollcall/shared';
import type { DocumentCollection } from '../store/index.js';

/**
 * Roster lookup used before a link-based mark. Anonymous visitors may only
 * mark students the roster knows.
 */
export interface StudentDirectory {
  find(studentId: string): Promise<Student | null>;
}

export function rosterDirectory(students: DocumentCollection<Student>): StudentDirectory {
  return {
    find: (studentId) => students.findOne({ studentId }),
  };
}
