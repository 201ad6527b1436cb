// Postgres collection implementations
export { PgDocumentCollection } from './pg-document-collection.js';
export { PgHeaderCollection, headerToRow, rowToHeader } from './header-collection.js';
export {
  PgEventTypeDescriptorCollection,
  eventDescriptorToRow,
  rowToEventDescriptor,
} from './event-type-descriptor-collection.js';
export { PgEventCollection, eventToRow, rowToEvent } from './event-collection.js';
export {
  PgBeamlineConfigCollection,
  beamlineConfigToRow,
  rowToBeamlineConfig,
} from './beamline-config-collection.js';
export { buildCreateIndexSql } from './index-ddl.js';
export { toStorageError } from './errors.js';
export { createPgMetadataStore } from './context.js';
