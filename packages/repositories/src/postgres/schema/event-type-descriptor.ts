import { pgTable, text, bigint, jsonb, index } from 'drizzle-orm/pg-core';
import type { DocumentMap } from '@runmeta/protocol';

/**
 * Event type descriptors - named schema for a family of events.
 */
export const eventTypeDescriptor = pgTable(
  'event_type_descriptor',
  {
    id: text('id').primaryKey(),
    headerId: text('header_id').notNull(),
    eventTypeId: bigint('event_type_id', { mode: 'number' }).notNull(),
    descriptorName: text('descriptor_name').notNull(),
    tag: text('tag'),
    typeDescriptor: jsonb('type_descriptor').$type<DocumentMap>().notNull(), // field name -> type
  },
  (table) => [
    index('event_type_descriptor_header_name_idx').on(
      table.headerId.desc(),
      table.descriptorName.desc()
    ),
  ]
);
