import type { DocumentMap, EventDocument, Id } from '@runmeta/protocol';
import { currentUser } from '../owner.js';
import { validateDict, validateInt, validateString } from '../validation/fields.js';
import { saveDocument, type SaveOptions } from './save.js';

export type EventInput = {
  headerId: Id;
  eventDescriptorId: Id;
  seqNo: number | string;
  /** Defaults to the user running the process */
  owner?: string;
  description?: string | null;
  /** Data point name -> value */
  data?: DocumentMap;
};

/**
 * One captured data point.
 * seq_no is neither unique nor ordered across events.
 */
export class Event {
  readonly headerId: Id;
  readonly eventDescriptorId: Id;
  readonly seqNo: number;
  readonly owner: string;
  readonly description: string | null;
  readonly data: Readonly<DocumentMap>;

  constructor(input: EventInput) {
    this.headerId = validateString(input.headerId, { field: 'header_id', nonEmpty: true });
    this.eventDescriptorId = validateString(input.eventDescriptorId, {
      field: 'event_descriptor_id',
      nonEmpty: true,
    });
    this.seqNo = validateInt(input.seqNo, { field: 'seq_no', min: 0 });
    this.owner = validateString(input.owner === undefined ? currentUser() : input.owner, {
      field: 'owner',
      nonEmpty: true,
    });
    this.description = validateString(input.description, {
      field: 'description',
      optional: true,
    });
    this.data = validateDict(input.data, 'data');
  }

  composeDocument(): EventDocument {
    return {
      header_id: this.headerId,
      event_descriptor_id: this.eventDescriptorId,
      seq_no: this.seqNo,
      owner: this.owner,
      description: this.description,
      data: { ...this.data },
    };
  }

  save(options: SaveOptions = {}): Promise<Id> {
    return saveDocument('event', this.composeDocument(), options);
  }
}
