/**
 * Field Resolver
 *
 * Dotted-path access into untyped records. Supports array indices
 * (`a.b[0].c`) and wildcard fan-out (`a.b[*].c`). Resolution never throws:
 * a failed lookup yields null and the reason is logged at debug.
 */

import type { DataRecord } from '../types/index.js';
import { getLogger } from '../logging/logger.js';
import { hasOwn, isPlainObject } from './records.js';

const log = getLogger('field-resolver');

const INDEXED_SEGMENT = /^([^[\]]*)\[(\d+|\*)\]$/;

const FORBIDDEN_SEGMENTS = new Set(['__proto__', 'prototype', 'constructor']);

function miss(path: string, reason: string): null {
  log.debug('Field resolution failed', { path, reason });
  return null;
}

/**
 * Resolve `path` against `record`.
 *
 * A literal key equal to the whole path wins over nested traversal, so a
 * mapping can use `"zoomMapping.action"` as a single key. `[*]` at the end
 * of a path returns the array itself; `[*]` followed by a sub-path returns
 * one entry per element, null where the sub-path does not resolve.
 */
export function getField(record: unknown, path: string): unknown {
  if (!path) return miss(path, 'empty path');

  if (isPlainObject(record) && hasOwn(record, path)) {
    return record[path] ?? null;
  }

  const segments = path.split('.');
  let current: unknown = record;

  for (let i = 0; i < segments.length; i++) {
    const segment = segments[i] ?? '';
    const indexed = INDEXED_SEGMENT.exec(segment);
    const key = indexed ? (indexed[1] ?? '') : segment;

    if (key) {
      if (!isPlainObject(current)) {
        return miss(path, `'${key}' looked up on a non-object`);
      }
      if (!hasOwn(current, key)) {
        return miss(path, `key '${key}' not found`);
      }
      current = current[key];
    }

    if (!indexed) continue;

    if (!Array.isArray(current)) {
      return miss(path, `'${key}' is not an array`);
    }

    const index = indexed[2] ?? '';
    if (index === '*') {
      const rest = segments.slice(i + 1).join('.');
      if (!rest) return current;
      return current.map((element: unknown) => getField(element, rest));
    }

    const position = Number(index);
    if (position >= current.length) {
      return miss(path, `index ${position} out of bounds for length ${current.length}`);
    }
    current = current[position];
  }

  return current ?? null;
}

/**
 * Assign `value` at a dotted path, creating intermediate objects.
 * Returns false (and changes nothing) when the path crosses an array or a
 * non-object value, or contains an unsafe segment.
 */
export function setField(record: DataRecord, path: string, value: unknown): boolean {
  const segments = path.split('.');
  if (segments.some((s) => s.length === 0 || FORBIDDEN_SEGMENTS.has(s))) {
    log.debug('Refusing to set field', { path, reason: 'invalid segment' });
    return false;
  }

  let current: DataRecord = record;
  for (const segment of segments.slice(0, -1)) {
    const next = current[segment];
    if (next === undefined || next === null) {
      const created: DataRecord = {};
      current[segment] = created;
      current = created;
    } else if (isPlainObject(next)) {
      current = next;
    } else {
      log.debug('Refusing to set field', { path, reason: `'${segment}' is not an object` });
      return false;
    }
  }

  const last = segments[segments.length - 1] ?? '';
  current[last] = value;
  return true;
}

function stringify(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/**
 * Replace each `{path}` in `template` with the resolved value, or with an
 * empty string when the path does not resolve.
 */
export function renderTemplate(template: string, record: unknown): string {
  return template.replace(/\{([^{}]+)\}/g, (_match, path: string) =>
    stringify(getField(record, path.trim()))
  );
}
