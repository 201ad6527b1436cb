// Errors raised by the record layer itself. Storage failures keep their own
// classes from @runmeta/repositories and pass through unchanged.

export type RecordErrorCode = 'VALIDATION_ERROR' | 'STORE_NOT_CONFIGURED';

export class RecordError extends Error {
  readonly code: RecordErrorCode;

  constructor(code: RecordErrorCode, message: string) {
    super(message);
    this.name = 'RecordError';
    this.code = code;
  }
}

/**
 * A record field failed validation. Thrown from the record constructors,
 * so nothing has reached the store.
 */
export class ValidationError extends RecordError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(message: string, options: { field?: string; details?: Record<string, unknown> } = {}) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.field = options.field;
    this.details = options.details;
  }
}

export class StoreNotConfiguredError extends RecordError {
  constructor() {
    super(
      'STORE_NOT_CONFIGURED',
      'No metadata store configured. Call configureStore() or pass { store } to save().'
    );
    this.name = 'StoreNotConfiguredError';
  }
}
