/**
 * Error types for storage operations
 */

export type StorageError =
  | { type: 'not_found'; resource: string; id: string }
  | { type: 'validation'; field: string; message: string }
  | { type: 'conflict'; message: string }
  | { type: 'database'; message: string; cause?: unknown }
  | { type: 'unavailable'; message: string; cause?: unknown };

/**
 * Result type for storage operations
 */
export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E };

/**
 * Human-readable message for a StorageError
 */
export function describeStorageError(error: StorageError): string {
  switch (error.type) {
    case 'not_found':
      return `${error.resource} with id ${error.id} not found`;
    case 'validation':
      return `Validation error on ${error.field}: ${error.message}`;
    case 'conflict':
    case 'database':
    case 'unavailable':
      return error.message;
  }
}
