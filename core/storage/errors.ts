export type StorageOperation = 'read' | 'write';

/**
 * Raised (or returned, for reads) when the storage collaborator cannot
 * complete an operation. The underlying error is kept as `cause`.
 */
export class StorageError extends Error {
  readonly path: string;
  readonly operation: StorageOperation;

  constructor(operation: StorageOperation, path: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause ?? 'unknown error');
    super(`Could not ${operation} ${path}: ${reason}`, { cause });
    this.name = 'StorageError';
    this.path = path;
    this.operation = operation;
  }
}
