import { pgTable, text, timestamp, jsonb, index, uniqueIndex } from 'drizzle-orm/pg-core';
import type { DocumentMap, ScanId } from '@runmeta/protocol';

/**
 * Header table - one row per run.
 *
 * Design notes:
 * - scan_id is JSONB so string and numeric scan ids round-trip unchanged
 * - header_id columns elsewhere are logical references; no foreign keys
 */
export const header = pgTable(
  'header',
  {
    id: text('id').primaryKey(),
    startTime: timestamp('start_time', { withTimezone: true }).notNull(),
    endTime: timestamp('end_time', { withTimezone: true }),
    owner: text('owner').notNull(),
    scanId: jsonb('scan_id').$type<ScanId>().notNull(),
    status: text('status').notNull(),
    beamlineId: text('beamline_id'),
    headerVersions: jsonb('header_versions').$type<unknown[]>().notNull(),
    custom: jsonb('custom').$type<DocumentMap>().notNull(),
    tags: jsonb('tags').$type<unknown[]>().notNull(),
  },
  (table) => [
    uniqueIndex('header_scan_id_idx').on(table.scanId.desc()),
    index('header_owner_start_time_idx').on(table.owner.desc(), table.startTime.desc()),
  ]
);
