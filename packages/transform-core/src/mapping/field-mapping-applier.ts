/**
 * FieldMappingApplier
 *
 * Turns declarative (source field, target field, rule) rows into a
 * transformed record. Missing optional fields are skipped; missing required
 * fields are collected for the caller to turn into a validation failure.
 */

import type { DataRecord, FieldMapping, Logger, SimpleRuleName } from '@callbridge/core';
import { getField, getLogger, isPlainObject, setField } from '@callbridge/core';

export interface MappingResult {
  record: DataRecord;
  /** Source fields of required mappings that were absent */
  missingRequired: string[];
}

const SIMPLE_RULES: ReadonlySet<string> = new Set<SimpleRuleName>([
  'uppercase',
  'lowercase',
  'capitalize',
  'boolean',
  'integer',
  'string',
]);

const FALSE_STRINGS = new Set(['', 'false', '0', 'no', 'off']);

export function isSimpleRule(name: string): name is SimpleRuleName {
  return SIMPLE_RULES.has(name);
}

/**
 * Source value for a mapping: a literal key first, then a dotted path.
 * Undefined when the field is absent or null, whichever way it was found.
 */
export function readSource(data: DataRecord, path: string): unknown {
  return getField(data, path) ?? undefined;
}

export class FieldMappingApplier {
  private readonly log: Logger;

  constructor(logger?: Logger) {
    this.log = logger ?? getLogger('field-mapping-applier');
  }

  /**
   * Write each present source value under its target field name (dotted
   * target names are written as literal keys).
   */
  applyFlat(data: DataRecord, mappings: readonly FieldMapping[]): MappingResult {
    const record: DataRecord = {};
    const missingRequired: string[] = [];

    for (const mapping of mappings) {
      const value = readSource(data, mapping.sourceField);
      if (value === undefined) {
        if (mapping.isRequired) missingRequired.push(mapping.sourceField);
        continue;
      }
      record[mapping.targetField] = this.applyRule(value, mapping);
    }

    this.reportMissing(missingRequired);
    return { record, missingRequired };
  }

  /**
   * Build `{ [targetParent]: {...} }` from mappings whose target field is
   * `targetParent.<child>`; undotted mappings land at the root. Dotted
   * mappings for other parents are ignored.
   */
  applyNested(data: DataRecord, mappings: readonly FieldMapping[], targetParent: string): MappingResult {
    const record: DataRecord = {};
    const nested: DataRecord = {};
    const missingRequired: string[] = [];

    for (const mapping of mappings) {
      const dot = mapping.targetField.indexOf('.');
      const parent = dot === -1 ? null : mapping.targetField.slice(0, dot);
      if (parent !== null && parent !== targetParent) continue;

      const value = readSource(data, mapping.sourceField);
      if (value === undefined) {
        if (mapping.isRequired) missingRequired.push(mapping.sourceField);
        continue;
      }

      const transformed = this.applyRule(value, mapping);
      if (parent === null) {
        record[mapping.targetField] = transformed;
      } else {
        setField(nested, mapping.targetField.slice(dot + 1), transformed);
      }
    }

    if (Object.keys(nested).length > 0) {
      const existing = record[targetParent];
      record[targetParent] = isPlainObject(existing) ? { ...existing, ...nested } : nested;
    }

    this.reportMissing(missingRequired);
    return { record, missingRequired };
  }

  /**
   * Apply a mapping's simple rule. Null values and unknown rule names pass
   * through; a value the rule cannot convert is kept as-is.
   */
  applyRule(value: unknown, mapping: Pick<FieldMapping, 'transformationRule' | 'sourceField'>): unknown {
    const rule = mapping.transformationRule;
    if (!rule || value === null || value === undefined) return value;

    if (!isSimpleRule(rule)) {
      this.log.debug('Unknown transformation rule, passing value through', {
        rule,
        field: mapping.sourceField,
      });
      return value;
    }

    switch (rule) {
      case 'uppercase':
        return String(value).toUpperCase();
      case 'lowercase':
        return String(value).toLowerCase();
      case 'capitalize': {
        const str = String(value);
        return str.charAt(0).toUpperCase() + str.slice(1).toLowerCase();
      }
      case 'boolean':
        return typeof value === 'string' ? !FALSE_STRINGS.has(value.trim().toLowerCase()) : Boolean(value);
      case 'integer':
        return this.toInteger(value, mapping.sourceField);
      case 'string':
        return String(value);
    }
  }

  private toInteger(value: unknown, field: string): unknown {
    if (!value) return 0;
    if (typeof value === 'number' && Number.isFinite(value)) return Math.trunc(value);
    if (typeof value === 'boolean') return 1;
    if (typeof value === 'string' && /^[+-]?\d+$/.test(value.trim())) {
      return Number.parseInt(value.trim(), 10);
    }
    this.log.warn("Cannot apply rule 'integer', keeping value", { field, value });
    return value;
  }

  private reportMissing(missing: string[]): void {
    if (missing.length > 0) {
      this.log.warn('Missing required fields in data', { fields: missing });
    }
  }
}
