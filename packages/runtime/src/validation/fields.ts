// Field validators shared by the record constructors.
//
// Each validator takes an unchecked value and returns the validated value
// or throws ValidationError naming the field. Containers are copied, so a
// record never shares a mapping or list with its caller, and omitted
// containers become a new empty one on every call.
//
// Mappings and lists hold JSON values only: documents are stored as JSONB,
// which has no NaN, Infinity, Date or typed array.

import { z } from 'zod';
import type { DocumentMap, ScanId } from '@runmeta/protocol';
import { ValidationError } from '../errors.js';

const stringSchema = z.string();
const nonEmptyStringSchema = z.string().trim().min(1);

type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const prototype = Object.getPrototypeOf(value);
  if (prototype !== Object.prototype && prototype !== null) return false;
  return !Object.hasOwn(value, '__proto__');
}

const plainObjectSchema = z.custom<Record<string, unknown>>(isPlainObject, {
  message: 'Expected a plain object without a __proto__ key',
  fatal: true,
});

const jsonValueSchema: z.ZodType<JsonValue, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    plainObjectSchema.pipe(z.record(jsonValueSchema)),
  ])
);

const mapSchema = plainObjectSchema.pipe(z.record(jsonValueSchema));
const listSchema = z.array(jsonValueSchema);
const intSchema = z
  .union([z.number(), z.string().trim().regex(/^[+-]?\d+$/).transform(Number)])
  .pipe(z.number().int().safe());
const timestampSchema = z.union([
  z.date().transform((date) => new Date(date.getTime())),
  z
    .string()
    .datetime({ offset: true })
    .transform((iso) => new Date(iso)),
]);
const scanIdSchema = z.union([z.string().trim().min(1), z.number().finite()]);

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (value instanceof Date) return 'date';
  if (ArrayBuffer.isView(value)) return 'typed array';
  return typeof value;
}

function fail(field: string, expected: string, value: unknown, issues?: z.ZodIssue[]): never {
  throw new ValidationError(`Invalid ${field}: expected ${expected}, got ${describeValue(value)}`, {
    field,
    details: {
      expected,
      received: describeValue(value),
      issues:
        issues?.map((issue) =>
          issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
        ) ?? [],
    },
  });
}

export type StringFieldOptions = {
  field: string;
  /** null and undefined are accepted and returned as null */
  optional?: boolean;
  /** Reject empty and whitespace-only strings */
  nonEmpty?: boolean;
};

export function validateString(
  value: unknown,
  options: StringFieldOptions & { optional: true }
): string | null;
export function validateString(value: unknown, options: StringFieldOptions): string;
export function validateString(value: unknown, options: StringFieldOptions): string | null {
  const { field, optional = false, nonEmpty = false } = options;

  if (value === null || value === undefined) {
    if (optional) return null;
    fail(field, 'a string', value);
  }

  const result = (nonEmpty ? nonEmptyStringSchema : stringSchema).safeParse(value);
  if (!result.success) {
    fail(field, nonEmpty ? 'a non-empty string' : 'a string', value, result.error.issues);
  }
  // Validation only; the value is stored as given
  return typeof value === 'string' ? value : result.data;
}

/**
 * Validate a free-form mapping of JSON values. undefined yields a fresh
 * empty mapping.
 */
export function validateDict(value: unknown, field: string): DocumentMap {
  if (value === undefined) return {};

  const result = mapSchema.safeParse(value);
  if (!result.success) {
    fail(field, 'a mapping of JSON values', value, result.error.issues);
  }
  return result.data;
}

/**
 * Validate an ordered sequence of JSON values. undefined yields a fresh
 * empty list.
 */
export function validateList(value: unknown, field: string): unknown[] {
  if (value === undefined) return [];

  const result = listSchema.safeParse(value);
  if (!result.success) {
    fail(field, 'a list of JSON values', value, result.error.issues);
  }
  return result.data;
}

/**
 * Validate an integer. Strings of decimal digits are converted.
 */
export function validateInt(value: unknown, options: { field: string; min?: number }): number {
  const { field, min } = options;

  const result = intSchema.safeParse(value);
  if (!result.success) {
    fail(field, 'an integer', value, result.error.issues);
  }
  if (min !== undefined && result.data < min) {
    fail(field, `an integer >= ${min}`, value);
  }
  return result.data;
}

/**
 * Validate a required timestamp: a valid Date or an ISO 8601 string with
 * time and offset.
 */
export function validateStartTime(value: unknown, field = 'start_time'): Date {
  if (value === null || value === undefined) {
    fail(field, 'a timestamp', value);
  }

  const result = timestampSchema.safeParse(value);
  if (!result.success) {
    fail(field, 'a timestamp', value, result.error.issues);
  }
  return result.data;
}

/**
 * Validate an optional timestamp. Absent values become null.
 */
export function validateEndTime(value: unknown, field = 'end_time'): Date | null {
  if (value === null || value === undefined) return null;
  return validateStartTime(value, field);
}

/**
 * Validate a scan id: a non-empty string or a finite number.
 */
export function validateScanId(value: unknown, field = 'scan_id'): ScanId {
  const result = scanIdSchema.safeParse(value);
  if (!result.success) {
    fail(field, 'a string or number', value, result.error.issues);
  }
  // trim() only checks blankness; keep the caller's string
  return typeof value === 'string' ? value : result.data;
}
