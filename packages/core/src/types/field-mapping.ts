/**
 * Declarative field mapping and transformation config types
 */

/** Simple value rules understood by the field-mapping applier */
export type SimpleRuleName =
  | 'uppercase'
  | 'lowercase'
  | 'capitalize'
  | 'boolean'
  | 'integer'
  | 'string';

/**
 * One (source field, target field, rule) tuple.
 *
 * Within a (jobTypeId, sourcePlatform, targetEntity) group, targetField
 * values are unique.
 */
export interface FieldMapping {
  id?: number;
  jobTypeId: number;
  sourcePlatform: string;
  targetEntity: string;
  sourceField: string;
  /** May be dotted (`user_info.email`) to build a nested object */
  targetField: string;
  /** Rule name; unknown names pass the value through */
  transformationRule?: string | null;
  isRequired: boolean;
  description?: string | null;
}

/** Free-form settings bundle parsed from a job type's YAML config */
export type TransformationSettings = {
  [key: string]: unknown;
};

