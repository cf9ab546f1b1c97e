/**
 * Zod schemas for validating engine inputs
 */

import { z } from 'zod';
import type { FieldMapping } from '../types/index.js';

/** Platform names are compared case-insensitively */
export const platformNameSchema = z
  .string()
  .trim()
  .min(1)
  .transform((value) => value.toLowerCase());

/**
 * A field mapping row as stored (snake_case columns or JSON keys),
 * normalised to the FieldMapping shape.
 */
export const fieldMappingRowSchema = z
  .object({
    id: z.number().int().optional(),
    job_type_id: z.coerce.number().int(),
    source_platform: platformNameSchema,
    target_entity: z.string().min(1),
    source_field: z.string().min(1).optional(),
    ssot_field: z.string().min(1).optional(),
    target_field: z.string().min(1),
    transformation_rule: z.string().nullish(),
    is_required: z.boolean().default(false),
    description: z.string().nullish(),
  })
  .refine((row) => row.source_field !== undefined || row.ssot_field !== undefined, {
    message: 'source_field (or ssot_field) is required',
    path: ['source_field'],
  })
  .transform(
    (row): FieldMapping => ({
      id: row.id,
      jobTypeId: row.job_type_id,
      sourcePlatform: row.source_platform,
      targetEntity: row.target_entity,
      sourceField: row.source_field ?? row.ssot_field ?? '',
      targetField: row.target_field,
      transformationRule: row.transformation_rule ?? null,
      isRequired: row.is_required,
      description: row.description ?? null,
    })
  );

export type FieldMappingRow = z.input<typeof fieldMappingRowSchema>;

/** A job type may be addressed by its code or its numeric id */
export const jobTypeRefSchema = z.union([
  z.string().trim().min(1),
  z.number().int().positive(),
]);

export const transformRequestSchema = z.object({
  sourcePlatform: platformNameSchema,
  targetPlatform: platformNameSchema,
  jobType: jobTypeRefSchema,
  data: z.record(z.unknown()),
});

export type TransformRequest = z.infer<typeof transformRequestSchema>;

/**
 * Duplicate target fields within one (job type, source, entity) group.
 */
export function findDuplicateTargetFields(mappings: readonly FieldMapping[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const m of mappings) {
    const key = `${m.jobTypeId}|${m.sourcePlatform}|${m.targetEntity}|${m.targetField}`;
    if (seen.has(key)) duplicates.add(m.targetField);
    seen.add(key);
  }
  return Array.from(duplicates);
}
