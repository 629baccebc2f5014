/**
 * src/shared/db/storage-error.ts
 *
 * WHY:
 * - Repositories must distinguish "not found" (undefined) from "storage failure" (throw).
 * - StorageError carries the failed operation name + original cause for server-side logs.
 *   The client only ever sees a generic retry message (see http/error-handler.ts).
 *
 * RULES:
 * - DAL wraps driver errors with runStorage(); services never catch pg errors directly.
 * - Unique violations are NOT storage failures: repos map them to typed results.
 */

export class StorageError extends Error {
  readonly operation: string;

  constructor(operation: string, options: { cause: unknown }) {
    super(`Storage operation failed: ${operation}`, options);
    this.name = 'StorageError';
    this.operation = operation;
  }
}

/** Postgres SQLSTATE for unique_violation. */
const PG_UNIQUE_VIOLATION = '23505';

export function isUniqueViolation(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    err.code === PG_UNIQUE_VIOLATION
  );
}

/**
 * Runs a DAL operation and converts any driver error into a StorageError.
 * Errors that are already StorageErrors pass through untouched.
 */
export async function runStorage<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof StorageError) throw err;
    throw new StorageError(operation, { cause: err });
  }
}
