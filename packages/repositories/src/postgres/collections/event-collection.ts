import { eq } from 'drizzle-orm';
import type { EventDocument, Id } from '@runmeta/protocol';
import type { Database } from '../db.js';
import { event } from '../schema/index.js';
import { PgDocumentCollection } from './pg-document-collection.js';

export function eventToRow(id: Id, document: EventDocument): typeof event.$inferInsert {
  return {
    id,
    headerId: document.header_id,
    eventDescriptorId: document.event_descriptor_id,
    seqNo: document.seq_no,
    owner: document.owner,
    description: document.description,
    data: document.data,
  };
}

export function rowToEvent(row: typeof event.$inferSelect): EventDocument {
  return {
    header_id: row.headerId,
    event_descriptor_id: row.eventDescriptorId,
    seq_no: row.seqNo,
    owner: row.owner,
    description: row.description,
    data: row.data,
  };
}

export class PgEventCollection extends PgDocumentCollection<'event'> {
  constructor(db: Database) {
    super('event', db);
  }

  protected async insertRow(id: Id, document: EventDocument): Promise<void> {
    await this.db.insert(event).values(eventToRow(id, document));
  }

  protected async selectRow(id: Id): Promise<EventDocument | null> {
    const [row] = await this.db.select().from(event).where(eq(event.id, id));
    return row ? rowToEvent(row) : null;
  }
}
