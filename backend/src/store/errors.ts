export class StorageError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'StorageError';
  }
}

export class DuplicateKeyError extends StorageError {
  constructor(
    readonly collection: string,
    readonly fields: string[],
  ) {
    super(`Duplicate key in ${collection}: ${fields.join(', ')}`);
    this.name = 'DuplicateKeyError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
