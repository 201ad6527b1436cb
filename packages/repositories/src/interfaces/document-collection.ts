import type {
  CollectionDocuments,
  CollectionName,
  DocumentField,
  Id,
  IndexSpec,
} from '@runmeta/protocol';

/**
 * Write options passed through from a record's save() to the backend.
 */
export type InsertOptions = {
  /** Use this id instead of letting the store generate one */
  id?: Id;
};

/**
 * Repository interface for one named document collection.
 *
 * Implementations reject with StorageConstraintError when a write violates
 * a declared unique index or reuses an id, and with StorageConnectivityError
 * when the backend cannot be reached. Nothing is retried.
 */
export interface DocumentCollection<N extends CollectionName = CollectionName> {
  readonly name: N;

  /**
   * Insert a document. Insertion is atomic per document.
   * @returns The generated (or caller-supplied) id
   */
  insert(document: CollectionDocuments[N], options?: InsertOptions): Promise<Id>;

  /**
   * Declare an index. A no-op when an index with the same name already exists.
   */
  ensureIndex(spec: IndexSpec<DocumentField<N>>): Promise<void>;

  /**
   * Read back a document by id.
   * @returns Document in canonical field order, or null if not found
   */
  findById(id: Id): Promise<CollectionDocuments[N] | null>;
}
