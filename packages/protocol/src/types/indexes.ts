import type { CollectionName, DocumentField } from './documents.js';

/**
 * Sort direction of an index key: 1 ascending, -1 descending
 */
export type IndexDirection = 1 | -1;

/**
 * Declarative index specification.
 * Keys are ordered; the first key is the leading column of the index.
 */
export type IndexSpec<TField extends string = string> = {
  name: string;
  keys: ReadonlyArray<readonly [TField, IndexDirection]>;
  unique: boolean;
};

export type IndexPolicy = {
  readonly [K in CollectionName]: ReadonlyArray<IndexSpec<DocumentField<K>>>;
};

/**
 * Indexes every collection must carry before it is queried.
 *
 * scan_id uniqueness is enforced here and nowhere else.
 * The event index covers the free-form data mapping; some backends cap the
 * size of an indexed value, so very large data payloads can be rejected.
 */
export const INDEX_POLICY: IndexPolicy = {
  header: [
    { name: 'header_scan_id_idx', keys: [['scan_id', -1]], unique: true },
    {
      name: 'header_owner_start_time_idx',
      keys: [
        ['owner', -1],
        ['start_time', -1],
      ],
      unique: false,
    },
  ],
  event_type_descriptor: [
    {
      name: 'event_type_descriptor_header_name_idx',
      keys: [
        ['header_id', -1],
        ['descriptor_name', -1],
      ],
      unique: false,
    },
  ],
  event: [
    {
      name: 'event_descriptor_header_data_idx',
      keys: [
        ['event_descriptor_id', -1],
        ['header_id', 1],
        ['data', -1],
      ],
      unique: false,
    },
  ],
  beamline_config: [
    { name: 'beamline_config_header_idx', keys: [['header_id', -1]], unique: false },
  ],
};
