export { Header, DEFAULT_HEADER_STATUS, type HeaderInput } from './header.js';
export { EventDescriptor, type EventDescriptorInput } from './event-descriptor.js';
export { Event, type EventInput } from './event.js';
export { BeamlineConfig, type BeamlineConfigInput } from './beamline-config.js';
export { saveDocument, resolveStore, type SaveOptions, type StoreOptions } from './save.js';
