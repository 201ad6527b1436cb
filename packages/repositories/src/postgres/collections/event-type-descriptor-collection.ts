import { eq } from 'drizzle-orm';
import type { EventDescriptorDocument, Id } from '@runmeta/protocol';
import type { Database } from '../db.js';
import { eventTypeDescriptor } from '../schema/index.js';
import { PgDocumentCollection } from './pg-document-collection.js';

export function eventDescriptorToRow(
  id: Id,
  document: EventDescriptorDocument
): typeof eventTypeDescriptor.$inferInsert {
  return {
    id,
    headerId: document.header_id,
    eventTypeId: document.event_type_id,
    descriptorName: document.descriptor_name,
    tag: document.tag,
    typeDescriptor: document.type_descriptor,
  };
}

export function rowToEventDescriptor(
  row: typeof eventTypeDescriptor.$inferSelect
): EventDescriptorDocument {
  return {
    header_id: row.headerId,
    event_type_id: row.eventTypeId,
    descriptor_name: row.descriptorName,
    tag: row.tag,
    type_descriptor: row.typeDescriptor,
  };
}

export class PgEventTypeDescriptorCollection extends PgDocumentCollection<'event_type_descriptor'> {
  constructor(db: Database) {
    super('event_type_descriptor', db);
  }

  protected async insertRow(id: Id, document: EventDescriptorDocument): Promise<void> {
    await this.db.insert(eventTypeDescriptor).values(eventDescriptorToRow(id, document));
  }

  protected async selectRow(id: Id): Promise<EventDescriptorDocument | null> {
    const [row] = await this.db
      .select()
      .from(eventTypeDescriptor)
      .where(eq(eventTypeDescriptor.id, id));
    return row ? rowToEventDescriptor(row) : null;
  }
}
