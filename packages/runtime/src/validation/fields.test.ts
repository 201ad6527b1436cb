// Tests for field validators

import { describe, it, expect } from 'vitest';
import { ValidationError } from '../errors.js';
import {
  validateDict,
  validateEndTime,
  validateInt,
  validateList,
  validateScanId,
  validateStartTime,
  validateString,
} from './fields.js';

function captureError(fn: () => unknown): ValidationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) return error;
    throw error;
  }
  throw new Error('Expected a ValidationError');
}

describe('validateString', () => {
  it('should return strings unchanged', () => {
    expect(validateString(' alice ', { field: 'owner', nonEmpty: true })).toBe(' alice ');
    expect(validateString('', { field: 'status' })).toBe('');
  });

  it('should map absent optional values to null', () => {
    expect(validateString(undefined, { field: 'tag', optional: true })).toBeNull();
    expect(validateString(null, { field: 'tag', optional: true })).toBeNull();
  });

  it('should reject absent required values', () => {
    expect(captureError(() => validateString(undefined, { field: 'owner' })).field).toBe('owner');
  });

  it('should reject non-strings with a descriptive message', () => {
    const error = captureError(() => validateString(123, { field: 'owner', nonEmpty: true }));

    expect(error.message).toBe('Invalid owner: expected a non-empty string, got number');
    expect(error.code).toBe('VALIDATION_ERROR');
    expect(error.details).toMatchObject({ expected: 'a non-empty string', received: 'number' });
  });

  it('should reject blank strings when nonEmpty is set', () => {
    const error = captureError(() =>
      validateString('   ', { field: 'descriptor_name', nonEmpty: true })
    );
    expect(error.field).toBe('descriptor_name');
  });
});

describe('validateDict', () => {
  it('should return a fresh mapping for undefined', () => {
    const first = validateDict(undefined, 'custom');
    const second = validateDict(undefined, 'custom');

    expect(first).toEqual({});
    expect(first).not.toBe(second);
  });

  it('should copy the mapping without coercing values', () => {
    const input = { x: 1.0, label: 'scan', nested: { a: [1, 2] } };
    const result = validateDict(input, 'data');

    expect(result).toEqual(input);
    expect(result).not.toBe(input);
  });

  it.each([
    ['an array', [1, 2], 'array'],
    ['null', null, 'null'],
    ['a date', new Date('2024-03-01T09:00:00Z'), 'date'],
    ['a string', 'energy=12', 'string'],
  ])('should reject %s', (_label, value, received) => {
    const error = captureError(() => validateDict(value, 'custom'));

    expect(error.field).toBe('custom');
    expect(error.details?.received).toBe(received);
  });
  it.each([
    ['NaN', { x: NaN }],
    ['Infinity', { x: Infinity }],
    ['a nested date', { t: new Date('2024-03-01T09:00:00Z') }],
    ['undefined', { x: undefined }],
    ['a nested typed array', { frame: new Uint8Array([1, 2]) }],
    ['a deeply nested NaN', { nested: { values: [1, NaN] } }],
  ])('should reject a mapping holding %s', (_label, value) => {
    const error = captureError(() => validateDict(value, 'data'));

    expect(error.field).toBe('data');
    expect(error.message).toBe('Invalid data: expected a mapping of JSON values, got object');
  });

  it('should reject a typed array as the mapping itself', () => {
    const error = captureError(() => validateDict(new Uint8Array([1, 2]), 'data'));

    expect(error.details?.received).toBe('typed array');
  });

  it('should reject an own __proto__ key', () => {
    const value: unknown = JSON.parse('{"__proto__": {"x": 1}, "y": 2}');

    expect(captureError(() => validateDict(value, 'custom')).field).toBe('custom');
  });

  it('should accept nested JSON values and copy them deeply', () => {
    const input = { x: -1.5, ok: true, none: null, nested: { tags: ['a', { b: 2 }] } };
    const result = validateDict(input, 'data');

    expect(result).toEqual(input);
    expect(result.nested).not.toBe(input.nested);
  });
});

describe('validateList', () => {
  it('should return a fresh list for undefined', () => {
    const first = validateList(undefined, 'tags');

    expect(first).toEqual([]);
    expect(first).not.toBe(validateList(undefined, 'tags'));
  });

  it('should keep element order', () => {
    expect(validateList(['b', 'a', 3], 'tags')).toEqual(['b', 'a', 3]);
  });

  it('should reject mappings', () => {
    expect(captureError(() => validateList({ 0: 'a' }, 'tags')).field).toBe('tags');
  });

  it.each([[[NaN]], [[-Infinity]], [[new Date('2024-03-01T09:00:00Z')]]])(
    'should reject non-JSON elements in %s',
    (value) => {
      const error = captureError(() => validateList(value, 'header_versions'));

      expect(error.message).toBe('Invalid header_versions: expected a list of JSON values, got array');
    }
  );
});

describe('validateInt', () => {
  it('should accept integers and integer strings', () => {
    expect(validateInt(3, { field: 'seq_no' })).toBe(3);
    expect(validateInt('7', { field: 'seq_no' })).toBe(7);
    expect(validateInt(' -2 ', { field: 'event_type_id' })).toBe(-2);
  });

  it.each([2.5, '2.5', '1e3', true, NaN, Infinity, null, undefined, '', 2 ** 60])(
    'should reject %s',
    (value) => {
      expect(captureError(() => validateInt(value, { field: 'seq_no' })).field).toBe('seq_no');
    }
  );

  it('should enforce a lower bound', () => {
    expect(validateInt(0, { field: 'seq_no', min: 0 })).toBe(0);

    const error = captureError(() => validateInt(-1, { field: 'seq_no', min: 0 }));
    expect(error.message).toBe('Invalid seq_no: expected an integer >= 0, got number');
  });
});

describe('validateStartTime', () => {
  it('should copy Date values', () => {
    const start = new Date('2024-03-01T09:00:00Z');
    const result = validateStartTime(start);

    expect(result).toEqual(start);
    expect(result).not.toBe(start);
  });

  it('should parse ISO 8601 strings with an offset', () => {
    expect(validateStartTime('2024-03-01T11:00:00+02:00')).toEqual(
      new Date('2024-03-01T09:00:00Z')
    );
  });

  it.each([
    ['missing', undefined],
    ['null', null],
    ['an invalid date', new Date('not a date')],
    ['a date without time', '2024-03-01'],
    ['free text', 'yesterday'],
    ['epoch milliseconds', 1709283600000],
  ])('should reject %s', (_label, value) => {
    expect(captureError(() => validateStartTime(value)).field).toBe('start_time');
  });
});

describe('validateEndTime', () => {
  it('should map absent values to null', () => {
    expect(validateEndTime(undefined)).toBeNull();
    expect(validateEndTime(null)).toBeNull();
  });

  it('should validate present values as timestamps', () => {
    expect(validateEndTime('2024-03-01T10:00:00Z')).toEqual(new Date('2024-03-01T10:00:00Z'));
    expect(captureError(() => validateEndTime('soon')).field).toBe('end_time');
  });
});

describe('validateScanId', () => {
  it('should accept strings and numbers as given', () => {
    expect(validateScanId(42)).toBe(42);
    expect(validateScanId('scan-0042')).toBe('scan-0042');
  });

  it.each([undefined, null, '', '  ', NaN, { id: 1 }])('should reject %s', (value) => {
    expect(captureError(() => validateScanId(value)).field).toBe('scan_id');
  });
});
