import { pgTable, text, bigint, jsonb, index } from 'drizzle-orm/pg-core';
import type { DocumentMap } from '@runmeta/protocol';

/**
 * Events table - one captured data point per row.
 *
 * Design notes:
 * - data is indexed as a whole; B-tree entries over roughly 2.7kB are
 *   rejected by Postgres, so very large payloads fail to insert
 * - seq_no is not unique per descriptor
 */
export const event = pgTable(
  'event',
  {
    id: text('id').primaryKey(),
    headerId: text('header_id').notNull(),
    eventDescriptorId: text('event_descriptor_id').notNull(),
    seqNo: bigint('seq_no', { mode: 'number' }).notNull(),
    owner: text('owner').notNull(),
    description: text('description'),
    data: jsonb('data').$type<DocumentMap>().notNull(),
  },
  (table) => [
    index('event_descriptor_header_data_idx').on(
      table.eventDescriptorId.desc(),
      table.headerId.asc(),
      table.data.desc()
    ),
  ]
);
