// @runmeta/protocol
// Document shapes, collection names and the index policy shared by every
// storage backend and by the record layer.

export * from './types/index.js';
