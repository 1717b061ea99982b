import type { StorageBackendName, StorageConfig } from '@rollcall/shared';
import { createDynamoStore, createTableClient } from './dynamodb.js';
import { StorageError } from './errors.js';
import { createJsonFileStore } from './json-file.js';
import type { Store } from './types.js';
import type { TableNames } from '../config.js';

export { DuplicateKeyError, StorageError, describeError } from './errors.js';
export type { DocumentCollection, Filter, Store, Update } from './types.js';

export interface BackendSelection {
  backend: StorageBackendName;
  // Set when the configured backend was unreachable and the file store took over.
  fellBack: boolean;
}

export interface StoreOptions {
  region: string;
  tables: TableNames;
  dataDir: string;
}

/**
 * Decides once, at startup, which backend serves every collection. The
 * choice never changes for the life of the process.
 */
export async function selectBackend(
  preferred: StorageBackendName,
  storage: Pick<StorageConfig, 'fallbackToFile'>,
  probe: () => Promise<boolean>,
): Promise<BackendSelection> {
  if (preferred === 'file') return { backend: 'file', fellBack: false };
  if (await probe()) return { backend: 'dynamodb', fellBack: false };
  if (!storage.fallbackToFile) {
    throw new StorageError('DynamoDB is unreachable and file fallback is disabled');
  }
  console.warn('DynamoDB is unreachable, falling back to the JSON file store');
  return { backend: 'file', fellBack: true };
}

export function openStore(selection: BackendSelection, options: StoreOptions): Store {
  if (selection.backend === 'dynamodb') {
    return createDynamoStore(createTableClient(options.region), options.tables);
  }
  return createJsonFileStore(options.dataDir);
}
