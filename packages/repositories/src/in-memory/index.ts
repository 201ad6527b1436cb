// In-memory store implementation for development and testing
//
// Behaves like a document database for the operations the record layer uses:
// - documents are copied on the way in and out
// - unique indexes are enforced only once they have been declared
// - a unique index cannot be declared over existing duplicates
//
// Data does not persist between restarts.

import type {
  CollectionDocuments,
  CollectionName,
  DocumentField,
  Id,
  IndexSpec,
} from '@runmeta/protocol';
import type { DocumentCollection, InsertOptions, MetadataStore } from '../interfaces/index.js';
import { StorageConnectivityError, StorageConstraintError } from '../errors.js';

/**
 * One call made against the store, in call order.
 */
export type StoreCall = {
  collection: CollectionName;
  operation: 'insert' | 'ensureIndex' | 'findById';
};

/**
 * In-memory data store that can be accessed for debugging/inspection.
 */
export interface InMemoryDataStore {
  documents: { [K in CollectionName]: Map<Id, CollectionDocuments[K]> };
  indexes: { [K in CollectionName]: IndexSpec<DocumentField<K>>[] };
  calls: StoreCall[];
}

/**
 * Extended store with access to underlying data and failure injection.
 */
export interface InMemoryMetadataStore extends MetadataStore {
  /** Direct access to underlying data (for debugging/testing) */
  _data: InMemoryDataStore;
  /** Clear all documents, indexes and the call log */
  clear(): void;
  /** Make every subsequent call reject with StorageConnectivityError */
  simulateOutage(): void;
  /** Undo simulateOutage() */
  restore(): void;
}

type StoreState = {
  calls: StoreCall[];
  offline: boolean;
  closed: boolean;
};

class InMemoryCollection<N extends CollectionName> implements DocumentCollection<N> {
  private sequence = 0;

  constructor(
    readonly name: N,
    private documents: Map<Id, CollectionDocuments[N]>,
    private indexes: IndexSpec<DocumentField<N>>[],
    private state: StoreState
  ) {}

  async insert(document: CollectionDocuments[N], options: InsertOptions = {}): Promise<Id> {
    this.enter('insert');

    const id = options.id ?? this.nextId();
    if (this.documents.has(id)) {
      throw new StorageConstraintError(this.name, `Duplicate id "${id}" in ${this.name}`, {
        index: '_id',
      });
    }

    for (const spec of this.indexes) {
      if (!spec.unique) continue;
      const key = indexKey(spec, document);
      for (const existing of this.documents.values()) {
        if (indexKey(spec, existing) === key) {
          throw new StorageConstraintError(
            this.name,
            `Duplicate key ${key} for index ${spec.name} in ${this.name}`,
            { index: spec.name }
          );
        }
      }
    }

    this.documents.set(id, structuredClone(document));
    return id;
  }

  async ensureIndex(spec: IndexSpec<DocumentField<N>>): Promise<void> {
    this.enter('ensureIndex');

    if (this.indexes.some((existing) => existing.name === spec.name)) {
      return;
    }

    if (spec.unique) {
      const seen = new Set<string>();
      for (const document of this.documents.values()) {
        const key = indexKey(spec, document);
        if (seen.has(key)) {
          throw new StorageConstraintError(
            this.name,
            `Cannot build unique index ${spec.name}: duplicate key ${key}`,
            { index: spec.name }
          );
        }
        seen.add(key);
      }
    }

    this.indexes.push(structuredClone(spec));
  }

  async findById(id: Id): Promise<CollectionDocuments[N] | null> {
    this.enter('findById');

    const document = this.documents.get(id);
    return document ? structuredClone(document) : null;
  }

  private enter(operation: StoreCall['operation']): void {
    this.state.calls.push({ collection: this.name, operation });

    if (this.state.closed) {
      throw new StorageConnectivityError(this.name, 'In-memory store is closed');
    }
    if (this.state.offline) {
      throw new StorageConnectivityError(this.name, 'In-memory store is offline');
    }
  }

  private nextId(): Id {
    let id: Id;
    do {
      this.sequence += 1;
      id = `${this.name}-${this.sequence}`;
    } while (this.documents.has(id));
    return id;
  }
}

function indexKey<N extends CollectionName>(
  spec: IndexSpec<DocumentField<N>>,
  document: CollectionDocuments[N]
): string {
  return JSON.stringify(spec.keys.map(([field]) => document[field] ?? null));
}

/**
 * Create an in-memory metadata store.
 *
 * @example
 * ```typescript
 * const store = createInMemoryMetadataStore();
 * const id = await new Header({ startTime: new Date(), scanId: 1 }).save({ store });
 *
 * // Inspect what was written
 * console.log(store._data.documents.header.get(id));
 * ```
 */
export function createInMemoryMetadataStore(): InMemoryMetadataStore {
  const data: InMemoryDataStore = {
    documents: {
      header: new Map(),
      event_type_descriptor: new Map(),
      event: new Map(),
      beamline_config: new Map(),
    },
    indexes: {
      header: [],
      event_type_descriptor: [],
      event: [],
      beamline_config: [],
    },
    calls: [],
  };

  const state: StoreState = { calls: data.calls, offline: false, closed: false };

  const collections: { [K in CollectionName]: InMemoryCollection<K> } = {
    header: new InMemoryCollection('header', data.documents.header, data.indexes.header, state),
    event_type_descriptor: new InMemoryCollection(
      'event_type_descriptor',
      data.documents.event_type_descriptor,
      data.indexes.event_type_descriptor,
      state
    ),
    event: new InMemoryCollection('event', data.documents.event, data.indexes.event, state),
    beamline_config: new InMemoryCollection(
      'beamline_config',
      data.documents.beamline_config,
      data.indexes.beamline_config,
      state
    ),
  };

  return {
    _data: data,

    collection<N extends CollectionName>(name: N): DocumentCollection<N> {
      return collections[name];
    },

    async close() {
      state.closed = true;
    },

    clear() {
      data.documents.header.clear();
      data.documents.event_type_descriptor.clear();
      data.documents.event.clear();
      data.documents.beamline_config.clear();
      data.indexes.header.length = 0;
      data.indexes.event_type_descriptor.length = 0;
      data.indexes.event.length = 0;
      data.indexes.beamline_config.length = 0;
      data.calls.length = 0;
    },

    simulateOutage() {
      state.offline = true;
    },

    restore() {
      state.offline = false;
    },
  };
}
