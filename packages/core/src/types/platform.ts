/**
 * Platforms and entities known to the transformation engine
 */

export type EntityKind = 'site' | 'user' | 'call_queue' | 'auto_receptionist' | 'ivr';

/** Target kinds an IVR action can route to */
export type IvrTargetType = 'user' | 'call_queue' | 'auto_receptionist';

/**
 * A named (source, target, entity) transformation unit.
 *
 * `code` is the stable key callers use; `id` is the numeric key the
 * field-mapping tables are keyed by.
 */
export interface JobType {
  id: number;
  code: string;
  name: string;
  sourcePlatform: string;
  targetPlatform: string;
  entity: EntityKind;
  isExtractionOnly?: boolean;
  dependencies?: string[];
}
