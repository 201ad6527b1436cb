// Re-export all schema tables
export * from './header.js';
export * from './event-type-descriptor.js';
export * from './event.js';
export * from './beamline-config.js';
