// Process-wide store handle
//
// Records save to the store passed in their options, or to the one
// registered here. Typical startup:
//
//   const store = connectFromEnv();
//   await initializeSchema(store);
//   ...
//   await closeStore();

import { loadStoreConfig, memory, postgres, type MetadataStore } from '@runmeta/repositories';
import { StoreNotConfiguredError } from './errors.js';
import { silentLogger, type StoreLogger } from './logger.js';

let storeInstance: MetadataStore | null = null;

/**
 * Register the process-wide store, replacing any previous one.
 * The previous store is not closed.
 */
export function configureStore(store: MetadataStore): void {
  storeInstance = store;
}

/**
 * Get the process-wide store.
 *
 * @throws StoreNotConfiguredError if no store has been registered
 */
export function getStore(): MetadataStore {
  if (!storeInstance) {
    throw new StoreNotConfiguredError();
  }
  return storeInstance;
}

/**
 * Close and forget the process-wide store.
 */
export async function closeStore(): Promise<void> {
  if (storeInstance) {
    const store = storeInstance;
    storeInstance = null;
    await store.close();
  }
}

/**
 * Create a store from environment variables and register it.
 * Uses Postgres when DATABASE_URL is set, in-memory storage otherwise.
 */
export function connectFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  options: { logger?: StoreLogger } = {}
): MetadataStore {
  const logger = options.logger ?? silentLogger;
  const config = loadStoreConfig(env);

  let store: MetadataStore;
  if (config.databaseUrl) {
    store = postgres.createPgMetadataStore(
      postgres.createDatabase({
        connectionString: config.databaseUrl,
        maxConnections: config.maxConnections,
      })
    );
    logger.info('Using Postgres storage', { maxConnections: config.maxConnections });
  } else {
    store = memory.createInMemoryMetadataStore();
    logger.warn('DATABASE_URL not set, using in-memory storage');
  }

  configureStore(store);
  return store;
}
