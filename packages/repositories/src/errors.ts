// Storage error types

/**
 * Base class for errors raised by a storage backend.
 */
export class StorageError extends Error {
  readonly code: string;
  readonly collection: string;

  constructor(code: string, collection: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageError';
    this.code = code;
    this.collection = collection;
  }
}

/**
 * A write violated a unique index or reused an existing id.
 */
export class StorageConstraintError extends StorageError {
  readonly index?: string;

  constructor(
    collection: string,
    message: string,
    options?: { index?: string; cause?: unknown }
  ) {
    super('STORAGE_CONSTRAINT', collection, message, options);
    this.name = 'StorageConstraintError';
    this.index = options?.index;
  }
}

/**
 * The backend could not be reached or dropped the connection.
 */
export class StorageConnectivityError extends StorageError {
  constructor(collection: string, message: string, options?: { cause?: unknown }) {
    super('STORAGE_CONNECTIVITY', collection, message, options);
    this.name = 'StorageConnectivityError';
  }
}

/**
 * Invalid connection configuration.
 */
export class ConfigError extends Error {
  readonly code = 'CONFIG_ERROR';
  readonly keys: string[];

  constructor(keys: string[]) {
    super(`Invalid store configuration: ${keys.join(', ')}`);
    this.name = 'ConfigError';
    this.keys = keys;
  }
}
