import type { DocumentMap, EventDescriptorDocument, Id } from '@runmeta/protocol';
import { validateDict, validateInt, validateString } from '../validation/fields.js';
import { saveDocument, type SaveOptions } from './save.js';

export type EventDescriptorInput = {
  headerId: Id;
  eventTypeId: number | string;
  descriptorName: string;
  tag?: string | null;
  /** Field name -> field type */
  typeDescriptor?: DocumentMap;
};

/**
 * Describes the fields and field types of a family of events under a header.
 */
export class EventDescriptor {
  readonly headerId: Id;
  readonly eventTypeId: number;
  readonly descriptorName: string;
  readonly tag: string | null;
  readonly typeDescriptor: Readonly<DocumentMap>;

  constructor(input: EventDescriptorInput) {
    this.headerId = validateString(input.headerId, { field: 'header_id', nonEmpty: true });
    this.eventTypeId = validateInt(input.eventTypeId, { field: 'event_type_id' });
    this.descriptorName = validateString(input.descriptorName, {
      field: 'descriptor_name',
      nonEmpty: true,
    });
    this.tag = validateString(input.tag, { field: 'tag', optional: true });
    this.typeDescriptor = validateDict(input.typeDescriptor, 'type_descriptor');
  }

  composeDocument(): EventDescriptorDocument {
    return {
      header_id: this.headerId,
      event_type_id: this.eventTypeId,
      descriptor_name: this.descriptorName,
      tag: this.tag,
      type_descriptor: { ...this.typeDescriptor },
    };
  }

  save(options: SaveOptions = {}): Promise<Id> {
    return saveDocument('event_type_descriptor', this.composeDocument(), options);
  }
}
