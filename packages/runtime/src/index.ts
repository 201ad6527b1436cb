// @runmeta/runtime
// Validated run metadata records and the wiring that persists them.

// Records
export {
  Header,
  DEFAULT_HEADER_STATUS,
  EventDescriptor,
  Event,
  BeamlineConfig,
  saveDocument,
  resolveStore,
  type HeaderInput,
  type EventDescriptorInput,
  type EventInput,
  type BeamlineConfigInput,
  type SaveOptions,
  type StoreOptions,
} from './records/index.js';

// Field validators
export {
  validateString,
  validateDict,
  validateList,
  validateInt,
  validateStartTime,
  validateEndTime,
  validateScanId,
  type StringFieldOptions,
} from './validation/fields.js';

// Error types
export { RecordError, ValidationError, StoreNotConfiguredError } from './errors.js';
export type { RecordErrorCode } from './errors.js';

// Store handle and schema setup
export { configureStore, getStore, closeStore, connectFromEnv } from './session.js';
export { initializeSchema } from './schema/setup.js';
export { currentUser } from './owner.js';

// Logging
export {
  consoleLogger,
  silentLogger,
  createCapturingLogger,
  type StoreLogger,
  type LogEntry,
  type LogLevel,
} from './logger.js';
