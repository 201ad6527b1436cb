import { StorageConnectivityError, StorageConstraintError } from '../../errors.js';

const UNIQUE_VIOLATION = '23505';

// Socket errors from node and connection errors raised by postgres.js
const CONNECTIVITY_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EPIPE',
  'CONNECTION_CLOSED',
  'CONNECTION_ENDED',
  'CONNECTION_DESTROYED',
  'CONNECT_TIMEOUT',
]);

function stringProperty(error: unknown, key: string): string | undefined {
  if (typeof error === 'object' && error !== null && key in error) {
    const value: unknown = Reflect.get(error, key);
    return typeof value === 'string' ? value : undefined;
  }
  return undefined;
}

/**
 * Map a driver error onto the storage error taxonomy.
 *
 * Unique violations and connection failures are wrapped, keeping the driver
 * error as cause. Anything else is returned untouched.
 */
export function toStorageError(collection: string, error: unknown): unknown {
  const code = stringProperty(error, 'code');
  const message = error instanceof Error ? error.message : String(error);

  if (code === UNIQUE_VIOLATION) {
    return new StorageConstraintError(collection, message, {
      index: stringProperty(error, 'constraint_name'),
      cause: error,
    });
  }

  if (code !== undefined && CONNECTIVITY_CODES.has(code)) {
    return new StorageConnectivityError(collection, message, { cause: error });
  }

  return error;
}
