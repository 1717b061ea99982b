import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import {
  attendanceCollection,
  linksCollection,
  sessionsCollection,
  studentsCollection,
  usersCollection,
} from './collections.js';
import { DuplicateKeyError, StorageError, describeError } from './errors.js';
import { applyUpdate, fieldsOf, matchesFilter } from './filter.js';
import type { CollectionDefinition, DocumentCollection, Filter, Store, Update } from './types.js';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * A collection persisted as one JSON array per file. Every operation runs
 * through a per-collection queue, so read-modify-write sequences never
 * interleave within the process. Writes go to a temp file that is renamed
 * over the original.
 */
export class JsonFileCollection<T extends object> implements DocumentCollection<T> {
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly dataDir: string,
    private readonly definition: CollectionDefinition<T>,
  ) {}

  get name(): string {
    return this.definition.name;
  }

  get filePath(): string {
    return join(this.dataDir, `${this.definition.name}.json`);
  }

  findOne(filter: Filter<T>): Promise<T | null> {
    return this.exclusive('findOne', async () => {
      const docs = await this.load();
      return docs.find((doc) => matchesFilter(doc, filter)) ?? null;
    });
  }

  find(filter: Filter<T> = {}): Promise<T[]> {
    return this.exclusive('find', async () => {
      const docs = await this.load();
      return docs.filter((doc) => matchesFilter(doc, filter));
    });
  }

  insertOne(doc: T): Promise<void> {
    return this.exclusive('insertOne', async () => {
      const docs = await this.load();
      this.assertUnique(docs, doc);
      docs.push(doc);
      await this.save(docs);
    });
  }

  updateOne(filter: Filter<T>, update: Update<T>): Promise<T | null> {
    return this.exclusive('updateOne', async () => {
      const docs = await this.load();
      const index = docs.findIndex((doc) => matchesFilter(doc, filter));
      if (index === -1) return null;
      const updated = applyUpdate(docs[index], update);
      this.assertUnique(
        docs.filter((_, i) => i !== index),
        updated,
      );
      docs[index] = updated;
      await this.save(docs);
      return updated;
    });
  }

  deleteMany(filter: Filter<T>): Promise<number> {
    return this.exclusive('deleteMany', async () => {
      const docs = await this.load();
      const kept = docs.filter((doc) => !matchesFilter(doc, filter));
      const deleted = docs.length - kept.length;
      if (deleted > 0) await this.save(kept);
      return deleted;
    });
  }

  countDocuments(filter: Filter<T> = {}): Promise<number> {
    return this.exclusive('countDocuments', async () => {
      const docs = await this.load();
      return docs.filter((doc) => matchesFilter(doc, filter)).length;
    });
  }

  private exclusive<R>(operation: string, task: () => Promise<R>): Promise<R> {
    const result = this.queue.then(task).catch((err: unknown) => {
      if (err instanceof StorageError) throw err;
      throw new StorageError(`${operation} on ${this.filePath} failed: ${describeError(err)}`, { cause: err });
    });
    // The next operation waits for this one whether it succeeded or not.
    this.queue = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  private keyFields(): string[] {
    const { partitionKey, sortKey } = this.definition;
    return sortKey ? [partitionKey, sortKey] : [partitionKey];
  }

  private assertUnique(existing: T[], candidate: T): void {
    const fields = fieldsOf(candidate);
    const keyFields = this.keyFields();
    const sameKey = existing.some((doc) => {
      const other = fieldsOf(doc);
      return keyFields.every((field) => other.get(field) === fields.get(field));
    });
    if (sameKey) throw new DuplicateKeyError(this.name, keyFields);

    for (const field of this.definition.unique) {
      const value = fields.get(field);
      if (value === null || value === undefined) continue;
      if (existing.some((doc) => fieldsOf(doc).get(field) === value)) {
        throw new DuplicateKeyError(this.name, [field]);
      }
    }
  }

  private async load(): Promise<T[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }
    if (raw.trim() === '') return [];
    return z.array(this.definition.schema).parse(JSON.parse(raw));
  }

  private async save(docs: T[]): Promise<void> {
    await mkdir(this.dataDir, { recursive: true });
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    await writeFile(tempPath, JSON.stringify(docs, null, 2), 'utf8');
    await rename(tempPath, this.filePath);
  }
}

export function createJsonFileStore(dataDir: string): Store {
  return {
    backend: 'file',
    users: new JsonFileCollection(dataDir, usersCollection),
    attendance: new JsonFileCollection(dataDir, attendanceCollection),
    sessions: new JsonFileCollection(dataDir, sessionsCollection),
    links: new JsonFileCollection(dataDir, linksCollection),
    students: new JsonFileCollection(dataDir, studentsCollection),
  };
}
