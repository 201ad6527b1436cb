import type { DocumentMap, HeaderDocument, Id, ScanId } from '@runmeta/protocol';
import type { DocumentCollection } from '@runmeta/repositories';
import { ValidationError } from '../errors.js';
import { currentUser } from '../owner.js';
import {
  validateDict,
  validateEndTime,
  validateList,
  validateScanId,
  validateStartTime,
  validateString,
} from '../validation/fields.js';
import { resolveStore, saveDocument, type SaveOptions, type StoreOptions } from './save.js';

export const DEFAULT_HEADER_STATUS = 'In Progress';

export type HeaderInput = {
  startTime: Date | string;
  scanId: ScanId;
  beamlineId?: string | null;
  headerVersions?: unknown[];
  status?: string;
  /** Defaults to the user running the process */
  owner?: string;
  endTime?: Date | string | null;
  tags?: unknown[];
  custom?: DocumentMap;
};

/**
 * Run header that captures the top-level metadata of one run.
 *
 * Fields are validated on construction and never change afterwards.
 * scan_id uniqueness is left to the store's unique index.
 */
export class Header {
  readonly startTime: Date;
  readonly endTime: Date | null;
  readonly owner: string;
  readonly scanId: ScanId;
  readonly status: string;
  readonly beamlineId: string | null;
  readonly headerVersions: readonly unknown[];
  readonly custom: Readonly<DocumentMap>;
  readonly tags: readonly unknown[];

  /**
   * @throws ValidationError if any field is malformed
   */
  constructor(input: HeaderInput) {
    this.startTime = validateStartTime(input.startTime);
    this.endTime = validateEndTime(input.endTime);
    if (this.endTime && this.endTime.getTime() < this.startTime.getTime()) {
      throw new ValidationError('Invalid end_time: earlier than start_time', {
        field: 'end_time',
        details: {
          startTime: this.startTime.toISOString(),
          endTime: this.endTime.toISOString(),
        },
      });
    }
    this.owner = validateString(input.owner === undefined ? currentUser() : input.owner, {
      field: 'owner',
      nonEmpty: true,
    });
    this.headerVersions = validateList(input.headerVersions, 'header_versions');
    this.scanId = validateScanId(input.scanId);
    this.tags = validateList(input.tags, 'tags');
    this.status = validateString(input.status ?? DEFAULT_HEADER_STATUS, { field: 'status' });
    this.beamlineId = validateString(input.beamlineId, { field: 'beamline_id', optional: true });
    this.custom = validateDict(input.custom, 'custom');
  }

  /**
   * Document for the 'header' collection, in canonical field order.
   */
  composeDocument(): HeaderDocument {
    return {
      start_time: new Date(this.startTime.getTime()),
      end_time: this.endTime ? new Date(this.endTime.getTime()) : null,
      owner: this.owner,
      scan_id: this.scanId,
      status: this.status,
      beamline_id: this.beamlineId,
      header_versions: [...this.headerVersions],
      custom: { ...this.custom },
      tags: [...this.tags],
    };
  }

  /**
   * Insert into the 'header' collection, then ensure the unique scan_id
   * index and the (owner, start_time) index.
   *
   * @returns The id generated by the store
   * @throws StorageConstraintError if the scan_id is already taken
   */
  save(options: SaveOptions = {}): Promise<Id> {
    return saveDocument('header', this.composeDocument(), options);
  }

  /**
   * The 'header' collection, for callers that need direct access.
   */
  getCollection(options: StoreOptions = {}): DocumentCollection<'header'> {
    return resolveStore(options).collection('header');
  }
}
