import {
  INDEX_POLICY,
  type CollectionDocuments,
  type CollectionName,
  type Id,
} from '@runmeta/protocol';
import type { InsertOptions, MetadataStore } from '@runmeta/repositories';
import { getStore } from '../session.js';
import { silentLogger, type StoreLogger } from '../logger.js';

export type StoreOptions = {
  /** Store to use instead of the process-wide one */
  store?: MetadataStore;
};

/**
 * Options accepted by every record's save().
 * Insert options (such as a caller-chosen id) are passed through to the store.
 */
export type SaveOptions = StoreOptions &
  InsertOptions & {
    logger?: StoreLogger;
  };

export function resolveStore(options: StoreOptions = {}): MetadataStore {
  return options.store ?? getStore();
}

/**
 * Insert a composed document, then ensure the collection's indexes.
 *
 * Nothing is caught here: constraint and connectivity errors from the
 * store reach the caller as raised. A failed insert skips index ensuring.
 */
export async function saveDocument<N extends CollectionName>(
  name: N,
  document: CollectionDocuments[N],
  options: SaveOptions = {}
): Promise<Id> {
  const { store, logger = silentLogger, ...insertOptions } = options;
  const collection = resolveStore({ store }).collection(name);

  const id = await collection.insert(document, insertOptions);
  logger.debug('Document inserted', { collection: name, id });

  for (const spec of INDEX_POLICY[name]) {
    await collection.ensureIndex(spec);
  }

  return id;
}
