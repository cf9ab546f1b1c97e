/**
 * Utility functions for working with records
 */

import type { DataRecord } from '../types/index.js';

export function isPlainObject(value: unknown): value is DataRecord {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    (Object.getPrototypeOf(value) === Object.prototype || Object.getPrototypeOf(value) === null)
  );
}

export function hasOwn(record: DataRecord, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, key);
}

/** Non-empty string, or null */
export function asString(value: unknown): string | null {
  if (typeof value === 'string') return value.length > 0 ? value : null;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

/** Plain object, or an empty one */
export function asRecord(value: unknown): DataRecord {
  return isPlainObject(value) ? value : {};
}

/** Array, or an empty one */
export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

/**
 * Loose truthiness for values coming out of untyped source payloads:
 * empty strings, empty arrays and empty objects count as absent.
 */
export function isPresent(value: unknown): boolean {
  if (value === null || value === undefined || value === false || value === 0) return false;
  if (typeof value === 'string') return value.length > 0;
  if (Array.isArray(value)) return value.length > 0;
  if (isPlainObject(value)) return Object.keys(value).length > 0;
  return true;
}

/**
 * Keys of `input` missing from `output` that are not documented removals.
 */
export function droppedKeys(
  input: DataRecord,
  output: DataRecord,
  removed: readonly string[] = []
): string[] {
  return Object.keys(input).filter((key) => !removed.includes(key) && !hasOwn(output, key));
}
