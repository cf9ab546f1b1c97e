/**
 * Config-driven cleanup of keypress (DTMF) action lists
 */

import type { DataRecord } from '@callbridge/core';
import { asRecord, getField, getLogger, isPlainObject, setField } from '@callbridge/core';

const log = getLogger('rules.dtmf');

/**
 * ```yaml
 * dtmf_cleanup:
 *   field: ivr_actions
 *   cleanup_rules:
 *     field_transformations:
 *       key: { value_mapping: { "0": operator } }
 *     filters:
 *       exclude_if_field_value: { field: action, values: [-1] }
 * ```
 */
export interface DtmfCleanupRule {
  field: string;
  cleanup_rules?: DtmfCleanupRules;
}

export interface DtmfCleanupRules {
  field_transformations?: FieldTransformations;
  filters?: {
    exclude_if_field_value?: { field: string; values: unknown[] };
  };
}

type FieldTransformations = { [field: string]: { value_mapping?: { [from: string]: unknown } } };

export function parseDtmfCleanupRule(value: unknown): DtmfCleanupRule | null {
  if (!isPlainObject(value) || typeof value.field !== 'string' || !value.field) return null;

  const rules = asRecord(value.cleanup_rules);
  const transformations: FieldTransformations = {};
  for (const [field, fieldRule] of Object.entries(asRecord(rules.field_transformations))) {
    const mapping = asRecord(asRecord(fieldRule).value_mapping);
    transformations[field] = { value_mapping: mapping };
  }

  const exclude = asRecord(asRecord(rules.filters).exclude_if_field_value);
  const filters =
    typeof exclude.field === 'string' && Array.isArray(exclude.values)
      ? { exclude_if_field_value: { field: exclude.field, values: exclude.values } }
      : {};

  return { field: value.field, cleanup_rules: { field_transformations: transformations, filters } };
}

function cleanItem(item: DataRecord, rule: DtmfCleanupRule): DataRecord | null {
  const cleaned: DataRecord = { ...item };

  for (const [field, fieldRule] of Object.entries(rule.cleanup_rules?.field_transformations ?? {})) {
    const current = cleaned[field];
    const mapping = fieldRule.value_mapping ?? {};
    if (typeof current === 'string' && Object.prototype.hasOwnProperty.call(mapping, current)) {
      cleaned[field] = mapping[current];
    }
  }

  const exclude = rule.cleanup_rules?.filters?.exclude_if_field_value;
  if (exclude && exclude.values.includes(cleaned[exclude.field])) {
    return null;
  }
  return cleaned;
}

/**
 * Rewrite the array at `rule.field` in place: value mappings first, then
 * exclusion filters. Non-object entries are dropped; a missing or
 * non-array field leaves the record untouched.
 */
export function applyDtmfCleanup(record: DataRecord, rule: DtmfCleanupRule): void {
  const items = getField(record, rule.field);
  if (!Array.isArray(items)) return;

  const cleaned: DataRecord[] = [];
  for (const item of items) {
    if (!isPlainObject(item)) continue;
    const result = cleanItem(item, rule);
    if (result !== null) cleaned.push(result);
  }

  if (cleaned.length !== items.length) {
    log.debug('DTMF cleanup removed entries', { field: rule.field, before: items.length, after: cleaned.length });
  }
  setField(record, rule.field, cleaned);
}
