// Tests for Header records

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { INDEX_POLICY } from '@runmeta/protocol';
import {
  StorageConnectivityError,
  StorageConstraintError,
  memory,
} from '@runmeta/repositories';
import { Header, type HeaderInput } from './header.js';
import { ValidationError, StoreNotConfiguredError } from '../errors.js';
import { closeStore, configureStore } from '../session.js';
import { createCapturingLogger } from '../logger.js';

// --- Test Fixtures ---

const T0 = new Date('2024-03-01T09:00:00Z');
const T1 = new Date('2024-03-01T10:30:00Z');

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected an error');
}

async function captureRejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected promise to reject');
}

// --- Tests ---

describe('Header', () => {
  let store: memory.InMemoryMetadataStore;

  beforeEach(() => {
    store = memory.createInMemoryMetadataStore();
    vi.stubEnv('LOGNAME', 'beamline-operator');
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await closeStore();
  });

  describe('construction', () => {
    it('should apply defaults for omitted fields', () => {
      const header = new Header({ startTime: T0, scanId: 42 });

      expect(header.composeDocument()).toEqual({
        start_time: T0,
        end_time: null,
        owner: 'beamline-operator',
        scan_id: 42,
        status: 'In Progress',
        beamline_id: null,
        header_versions: [],
        custom: {},
        tags: [],
      });
    });

    it('should compose fields in canonical order', () => {
      const document = new Header({ startTime: T0, scanId: 42 }).composeDocument();

      expect(Object.keys(document)).toEqual([
        'start_time',
        'end_time',
        'owner',
        'scan_id',
        'status',
        'beamline_id',
        'header_versions',
        'custom',
        'tags',
      ]);
    });

    it('should keep every supplied field', () => {
      const header = new Header({
        startTime: '2024-03-01T09:00:00Z',
        endTime: '2024-03-01T10:30:00Z',
        scanId: 'scan-0042',
        owner: 'alice',
        status: 'Complete',
        beamlineId: 'bl-7',
        headerVersions: [1, 2],
        tags: ['calibration'],
        custom: { sample: 'Si-111' },
      });

      expect(header.composeDocument()).toEqual({
        start_time: T0,
        end_time: T1,
        owner: 'alice',
        scan_id: 'scan-0042',
        status: 'Complete',
        beamline_id: 'bl-7',
        header_versions: [1, 2],
        custom: { sample: 'Si-111' },
        tags: ['calibration'],
      });
    });

    it('should resolve the default owner when each record is created', () => {
      const first = new Header({ startTime: T0, scanId: 1 });
      vi.stubEnv('LOGNAME', 'night-shift');
      const second = new Header({ startTime: T0, scanId: 2 });

      expect(first.owner).toBe('beamline-operator');
      expect(second.owner).toBe('night-shift');
    });

    it('should give each record its own default containers', () => {
      const first = new Header({ startTime: T0, scanId: 1 });
      const second = new Header({ startTime: T0, scanId: 2 });

      expect(first.custom).not.toBe(second.custom);
      expect(first.tags).not.toBe(second.tags);
      expect(first.headerVersions).not.toBe(second.headerVersions);
    });

    it('should not share containers with the caller', () => {
      const custom: Record<string, unknown> = { sample: 'Si-111' };
      const header = new Header({ startTime: T0, scanId: 1, custom });
      custom.sample = 'changed';

      expect(header.composeDocument().custom).toEqual({ sample: 'Si-111' });
    });

    it('should accept an end time equal to the start time', () => {
      expect(new Header({ startTime: T0, endTime: T0, scanId: 1 }).endTime).toEqual(T0);
    });

    it.each([
      ['owner', { owner: 123 }],
      ['owner', { owner: '' }],
      ['custom', { custom: ['not', 'a', 'mapping'] }],
      ['tags', { tags: 'calibration' }],
      ['status', { status: 5 }],
      ['beamline_id', { beamlineId: 7 }],
      ['start_time', { startTime: undefined }],
      ['start_time', { startTime: 'yesterday' }],
      ['end_time', { endTime: 'later' }],
      ['end_time', { endTime: '2024-03-01T08:00:00Z' }],
      ['scan_id', { scanId: undefined }],
    ])('should reject an invalid %s before touching the store', (field, overrides) => {
      const input = { startTime: T0, scanId: 42, ...overrides } as unknown as HeaderInput;

      const error = captureError(() => new Header(input));

      expect(error).toBeInstanceOf(ValidationError);
      expect((error as ValidationError).field).toBe(field);
      expect(store._data.calls).toEqual([]);
    });
  });

  describe('save', () => {
    it('should insert the composed document and return the generated id', async () => {
      const header = new Header({ startTime: T0, scanId: 42, owner: 'alice' });

      const id = await header.save({ store });

      expect(id).toBe('header-1');
      const stored = await store.collection('header').findById(id);
      expect(stored).toEqual(header.composeDocument());
      expect(stored).toMatchObject({ status: 'In Progress', tags: [], custom: {} });
    });

    it('should ensure the header indexes after inserting', async () => {
      await new Header({ startTime: T0, scanId: 42 }).save({ store });

      expect(store._data.indexes.header).toEqual(INDEX_POLICY.header);
      expect(store._data.calls).toEqual([
        { collection: 'header', operation: 'insert' },
        { collection: 'header', operation: 'ensureIndex' },
        { collection: 'header', operation: 'ensureIndex' },
      ]);
    });

    it('should reject a second run with the same scan_id', async () => {
      await new Header({ startTime: T0, scanId: 42, owner: 'alice' }).save({ store });

      const error = await captureRejection(
        new Header({ startTime: T1, scanId: 42, owner: 'bob' }).save({ store })
      );

      expect(error).toBeInstanceOf(StorageConstraintError);
      expect((error as StorageConstraintError).index).toBe('header_scan_id_idx');
      const owners = [...store._data.documents.header.values()].map((d) => d.owner);
      expect(owners).toEqual(['alice']);
    });

    it('should pass the caller-supplied id through to the store', async () => {
      const id = await new Header({ startTime: T0, scanId: 42 }).save({ store, id: 'run-42' });

      expect(id).toBe('run-42');
      expect(store._data.documents.header.has('run-42')).toBe(true);
    });

    it('should log the insert', async () => {
      const logger = createCapturingLogger();

      await new Header({ startTime: T0, scanId: 42 }).save({ store, logger });

      expect(logger.entries.map(({ level, message, data }) => ({ level, message, data }))).toEqual([
        { level: 'debug', message: 'Document inserted', data: { collection: 'header', id: 'header-1' } },
      ]);
    });

    it('should surface connectivity errors and skip index ensuring', async () => {
      store.simulateOutage();

      const error = await captureRejection(new Header({ startTime: T0, scanId: 42 }).save({ store }));

      expect(error).toBeInstanceOf(StorageConnectivityError);
      expect(store._data.calls).toEqual([{ collection: 'header', operation: 'insert' }]);
    });

    it('should use the process-wide store when none is passed', async () => {
      configureStore(store);

      const id = await new Header({ startTime: T0, scanId: 42 }).save();

      expect(store._data.documents.header.has(id)).toBe(true);
    });

    it('should reject when no store is available', async () => {
      const error = await captureRejection(new Header({ startTime: T0, scanId: 42 }).save());

      expect(error).toBeInstanceOf(StoreNotConfiguredError);
    });
  });

  describe('getCollection', () => {
    it('should return the header collection of the given store', () => {
      const header = new Header({ startTime: T0, scanId: 42 });

      expect(header.getCollection({ store })).toBe(store.collection('header'));
    });

    it('should fall back to the process-wide store', () => {
      configureStore(store);

      expect(new Header({ startTime: T0, scanId: 42 }).getCollection().name).toBe('header');
    });
  });
});
