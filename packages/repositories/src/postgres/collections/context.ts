import type { CollectionName } from '@runmeta/protocol';
import type { DatabaseConnection } from '../db.js';
import type {
  CollectionHandles,
  DocumentCollection,
  MetadataStore,
} from '../../interfaces/index.js';
import { PgHeaderCollection } from './header-collection.js';
import { PgEventTypeDescriptorCollection } from './event-type-descriptor-collection.js';
import { PgEventCollection } from './event-collection.js';
import { PgBeamlineConfigCollection } from './beamline-config-collection.js';

/**
 * Create a MetadataStore backed by Postgres.
 *
 * Tables come from drizzle-kit (see drizzle.config.ts); indexes are
 * ensured at run time from the index policy.
 *
 * Usage:
 * ```ts
 * const store = createPgMetadataStore(
 *   createDatabase({ connectionString: process.env.DATABASE_URL })
 * );
 *
 * const headers = store.collection('header');
 * const id = await headers.insert(document);
 * ```
 */
export function createPgMetadataStore(connection: DatabaseConnection): MetadataStore {
  const { db, client } = connection;

  const collections: CollectionHandles = {
    header: new PgHeaderCollection(db),
    event_type_descriptor: new PgEventTypeDescriptorCollection(db),
    event: new PgEventCollection(db),
    beamline_config: new PgBeamlineConfigCollection(db),
  };

  return {
    collection<N extends CollectionName>(name: N): DocumentCollection<N> {
      return collections[name];
    },

    async close() {
      await client.end();
    },
  };
}
