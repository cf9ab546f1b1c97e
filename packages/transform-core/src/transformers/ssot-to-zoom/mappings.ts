/**
 * Field-mapping plumbing for the mapping-driven SSOT transformers
 */

import type { DataRecord, EntityKind, FieldMapping, FieldMappingStore, Logger } from '@callbridge/core';
import { isPlainObject } from '@callbridge/core';
import { readSource } from '../../mapping/field-mapping-applier.js';

export const SSOT_PLATFORM = 'ssot';

/** Store failures degrade to "no mappings". */
export async function loadFieldMappings(
  store: FieldMappingStore,
  jobTypeId: number,
  entity: EntityKind,
  logger: Logger
): Promise<FieldMapping[]> {
  try {
    const mappings = await store.getFieldMappings(jobTypeId, SSOT_PLATFORM, entity);
    logger.debug('Loaded field mappings', { jobTypeId, entity, count: mappings.length });
    return mappings;
  } catch (error) {
    logger.warn('Field mappings unavailable, continuing without them', {
      jobTypeId,
      entity,
      error: error instanceof Error ? error.message : String(error),
    });
    return [];
  }
}

/** Source field of the mapping that targets `field` at the root or under `parent`. */
export function sourceFieldFor(mappings: readonly FieldMapping[], parent: string, field: string): string | null {
  const mapping = mappings.find((m) => m.targetField === field || m.targetField === `${parent}.${field}`);
  return mapping ? mapping.sourceField : null;
}

/** Value of a mapped source field, or undefined when the mapping or the value is absent. */
export function mappedValue(
  data: DataRecord,
  mappings: readonly FieldMapping[],
  parent: string,
  field: string
): unknown {
  const source = sourceFieldFor(mappings, parent, field);
  return source === null ? undefined : readSource(data, source);
}

/** Undotted mapping targets, which land at the root of the output */
export function rootTargets(mappings: readonly FieldMapping[]): string[] {
  return Array.from(new Set(mappings.map((m) => m.targetField).filter((target) => !target.includes('.'))));
}

/** Write `field` under `parent`, creating the parent object when needed. */
export function setUnder(record: DataRecord, parent: string, field: string, value: unknown): void {
  const existing = record[parent];
  const target: DataRecord = isPlainObject(existing) ? existing : {};
  target[field] = value;
  record[parent] = target;
}

/** Source fields of required mappings that `data` does not carry */
export function missingRequiredSources(data: DataRecord, mappings: readonly FieldMapping[]): string[] {
  return mappings
    .filter((m) => m.isRequired && readSource(data, m.sourceField) === undefined)
    .map((m) => m.sourceField);
}
