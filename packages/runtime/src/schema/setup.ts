import { COLLECTION_NAMES, INDEX_POLICY, type CollectionName } from '@runmeta/protocol';
import type { MetadataStore } from '@runmeta/repositories';
import { silentLogger, type StoreLogger } from '../logger.js';

async function ensureCollectionIndexes<N extends CollectionName>(
  store: MetadataStore,
  name: N,
  logger: StoreLogger
): Promise<number> {
  const collection = store.collection(name);
  const specs = INDEX_POLICY[name];

  for (const spec of specs) {
    await collection.ensureIndex(spec);
    logger.info('Index ensured', { collection: name, index: spec.name, unique: spec.unique });
  }

  return specs.length;
}

/**
 * Declare every index of the policy, one collection after another.
 *
 * Run once at startup, before accepting writes: until the unique scan_id
 * index exists, two concurrent first saves with the same scan_id can both
 * succeed.
 *
 * @returns Number of indexes ensured
 */
export async function initializeSchema(
  store: MetadataStore,
  options: { logger?: StoreLogger } = {}
): Promise<number> {
  const logger = options.logger ?? silentLogger;
  let ensured = 0;

  for (const name of COLLECTION_NAMES) {
    ensured += await ensureCollectionIndexes(store, name, logger);
  }

  logger.info('Schema initialized', { indexes: ensured });
  return ensured;
}
