// @runmeta/repositories
// Storage contract and backends for run metadata documents.
//
// This package defines the "contract" for data operations. The actual
// implementations (Postgres, in-memory) fulfill it, so the record layer
// works with any storage backend.
//
// Key concepts:
// - DocumentCollection defines WHAT a collection can do, not HOW
// - MetadataStore bundles the four collections for dependency injection
// - Storage errors share one taxonomy across backends

export * from './interfaces/index.js';
export * from './errors.js';
export { loadStoreConfig, type StoreConfig } from './config.js';
export * as postgres from './postgres/index.js';
export * as memory from './in-memory/index.js';
