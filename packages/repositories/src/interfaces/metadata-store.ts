import type { CollectionName } from '@runmeta/protocol';
import type { DocumentCollection } from './document-collection.js';

export type CollectionHandles = {
  readonly [K in CollectionName]: DocumentCollection<K>;
};

/**
 * MetadataStore bundles the four collections behind one handle.
 *
 * This is the dependency injection point for the record layer: pass a
 * store to save(), or register one process-wide, and swap Postgres for
 * in-memory without changing the records.
 *
 * Example usage:
 * ```typescript
 * const store = postgres.createPgMetadataStore(postgres.createDatabase(config));
 * const id = await new Header({ startTime, scanId: 42 }).save({ store });
 * ```
 */
export interface MetadataStore {
  collection<N extends CollectionName>(name: N): DocumentCollection<N>;

  /**
   * Release the underlying connection.
   */
  close(): Promise<void>;
}
