import { pgTable, text, jsonb, index } from 'drizzle-orm/pg-core';
import type { DocumentMap } from '@runmeta/protocol';

/**
 * Beamline configuration snapshots.
 */
export const beamlineConfig = pgTable(
  'beamline_config',
  {
    id: text('id').primaryKey(),
    headerId: text('header_id').notNull(),
    configParams: jsonb('config_params').$type<DocumentMap>().notNull(),
  },
  (table) => [index('beamline_config_header_idx').on(table.headerId.desc())]
);
