import type { DocumentMap, Id, ScanId } from './common.js';

/**
 * Names of the four collections, in the order the schema is set up.
 */
export const COLLECTION_NAMES = [
  'header',
  'event_type_descriptor',
  'event',
  'beamline_config',
] as const;

export type CollectionName = (typeof COLLECTION_NAMES)[number];

/**
 * Run header - top-level metadata for one experiment run.
 *
 * Optional values are persisted as null, never omitted, so readers of
 * existing documents always see the same key set.
 */
export type HeaderDocument = {
  start_time: Date;
  end_time: Date | null;
  owner: string;
  scan_id: ScanId;
  status: string;
  beamline_id: string | null;
  header_versions: unknown[];
  custom: DocumentMap;
  tags: unknown[];
};

/**
 * Event descriptor - schema of a family of events under one header.
 */
export type EventDescriptorDocument = {
  header_id: Id;
  event_type_id: number;
  descriptor_name: string;
  tag: string | null;
  type_descriptor: DocumentMap;
};

/**
 * Event - one captured data point.
 */
export type EventDocument = {
  header_id: Id;
  event_descriptor_id: Id;
  seq_no: number;
  owner: string;
  description: string | null;
  data: DocumentMap;
};

/**
 * Beamline configuration snapshot tied to a run.
 */
export type BeamlineConfigDocument = {
  header_id: Id;
  config_params: DocumentMap;
};

export type CollectionDocuments = {
  header: HeaderDocument;
  event_type_descriptor: EventDescriptorDocument;
  event: EventDocument;
  beamline_config: BeamlineConfigDocument;
};

export type DocumentField<N extends CollectionName> = keyof CollectionDocuments[N] & string;

/**
 * Canonical field order of each document. This is the wire contract for
 * anything reading the collections.
 */
export const DOCUMENT_FIELDS: { readonly [K in CollectionName]: readonly DocumentField<K>[] } = {
  header: [
    'start_time',
    'end_time',
    'owner',
    'scan_id',
    'status',
    'beamline_id',
    'header_versions',
    'custom',
    'tags',
  ],
  event_type_descriptor: [
    'header_id',
    'event_type_id',
    'descriptor_name',
    'tag',
    'type_descriptor',
  ],
  event: ['header_id', 'event_descriptor_id', 'seq_no', 'owner', 'description', 'data'],
  beamline_config: ['header_id', 'config_params'],
};
