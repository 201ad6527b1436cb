// Repository interfaces
// These define the contracts for data access, enabling substrate independence.

export type { DocumentCollection, InsertOptions } from './document-collection.js';

export type { MetadataStore, CollectionHandles } from './metadata-store.js';
