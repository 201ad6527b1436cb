// Re-export all protocol types

export * from './common.js';
export * from './documents.js';
export * from './indexes.js';
