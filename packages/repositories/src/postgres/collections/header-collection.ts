import { eq } from 'drizzle-orm';
import type { HeaderDocument, Id } from '@runmeta/protocol';
import type { Database } from '../db.js';
import { header } from '../schema/index.js';
import { PgDocumentCollection } from './pg-document-collection.js';

export function headerToRow(id: Id, document: HeaderDocument): typeof header.$inferInsert {
  return {
    id,
    startTime: document.start_time,
    endTime: document.end_time,
    owner: document.owner,
    scanId: document.scan_id,
    status: document.status,
    beamlineId: document.beamline_id,
    headerVersions: document.header_versions,
    custom: document.custom,
    tags: document.tags,
  };
}

export function rowToHeader(row: typeof header.$inferSelect): HeaderDocument {
  return {
    start_time: row.startTime,
    end_time: row.endTime,
    owner: row.owner,
    scan_id: row.scanId,
    status: row.status,
    beamline_id: row.beamlineId,
    header_versions: row.headerVersions,
    custom: row.custom,
    tags: row.tags,
  };
}

export class PgHeaderCollection extends PgDocumentCollection<'header'> {
  constructor(db: Database) {
    super('header', db);
  }

  protected async insertRow(id: Id, document: HeaderDocument): Promise<void> {
    await this.db.insert(header).values(headerToRow(id, document));
  }

  protected async selectRow(id: Id): Promise<HeaderDocument | null> {
    const [row] = await this.db.select().from(header).where(eq(header.id, id));
    return row ? rowToHeader(row) : null;
  }
}
