/**
 * SSOT IVR menus to Zoom IVR
 *
 * Driven by field-mapping rows (job type 78, entity `ivr`) nested under
 * `ivr_setting`. Menu options carry RingCentral-style keys and actions and
 * are mapped to the target's key names and action codes.
 */

import type {
  DataRecord,
  EntityKind,
  EntityTransformer,
  FieldMapping,
  Logger,
  TransformerDeps,
} from '@callbridge/core';
import { ValidationError, asRecord, asString, hasOwn, isPlainObject, isPresent } from '@callbridge/core';
import { FieldMappingApplier } from '../../mapping/field-mapping-applier.js';
import {
  actionTakesTarget,
  hoursOfOperation,
  isIvrTargetType,
  mapIvrAction,
  mapIvrKey,
  processAudioPrompt,
} from '../../rules/index.js';
import { loadFieldMappings, mappedValue, missingRequiredSources, rootTargets, setUnder } from './mappings.js';

const PARENT = 'ivr_setting';

/**
 * One menu option: key mapped, action mapped for the target type named on
 * the option (user when absent), target dropped when the action takes none
 * or the extension id is empty.
 */
export function processMenuOption(option: unknown): unknown {
  if (!isPlainObject(option)) return option;
  const processed: DataRecord = { ...option };

  const key = asString(option.key);
  if (key !== null) processed.key = mapIvrKey(key);

  const sourceAction = asString(option.action);
  if (sourceAction === null || typeof option.action === 'number') return processed;

  const target = isPlainObject(option.target) ? option.target : null;
  const targetType = target && isIvrTargetType(target.type) ? target.type : 'user';
  const code = mapIvrAction(sourceAction, targetType);
  processed.action = code;

  const extensionId = target ? asString(target.extension_id) : null;
  if (!actionTakesTarget(code) || extensionId === null || extensionId.startsWith('{')) {
    delete processed.target;
  } else {
    processed.target = { ...(target ?? {}), type: targetType, extension_id: extensionId };
  }
  return processed;
}

export class SsotIvrTransformer implements EntityTransformer {
  readonly jobTypeCode: string = 'ssot_to_zoom_ivr';
  readonly jobTypeId: number = 78;
  readonly entity: EntityKind = 'ivr';
  readonly removedFields: readonly string[] = [];

  private readonly log: Logger;
  private readonly applier: FieldMappingApplier;
  private mappings: FieldMapping[] = [];

  constructor(private readonly deps: TransformerDeps) {
    this.log = deps.logger.child({ jobTypeCode: this.jobTypeCode });
    this.applier = new FieldMappingApplier(this.log);
  }

  /** The nested target object plus the root-level targets of the loaded mappings */
  get rewrittenFields(): readonly string[] {
    return [PARENT, ...rootTargets(this.mappings).filter((target) => target !== PARENT)];
  }

  async initialize(): Promise<void> {
    this.mappings = await loadFieldMappings(this.deps.fieldMappings, this.jobTypeId, this.entity, this.log);
  }

  transform(record: DataRecord): DataRecord {
    const result = this.applier.applyNested(record, this.mappings, PARENT);
    if (result.missingRequired.length > 0) {
      throw new ValidationError({
        message: `Missing required fields: ${result.missingRequired.join(', ')}`,
        jobTypeCode: this.jobTypeCode,
        missingFields: result.missingRequired,
      });
    }

    const out: DataRecord = { ...record, ...result.record };
    out[PARENT] = { ...asRecord(out[PARENT]) };

    const siteId = mappedValue(record, this.mappings, PARENT, 'site_id');
    if (siteId !== undefined) setUnder(out, PARENT, 'site_id', siteId);

    const prompt = processAudioPrompt(mappedValue(record, this.mappings, PARENT, 'audio_prompt'));
    if (prompt !== null) setUnder(out, PARENT, 'audio_prompt', prompt);

    const options = mappedValue(record, this.mappings, PARENT, 'menu_options');
    if (Array.isArray(options) && options.length > 0) {
      setUnder(out, PARENT, 'menu_options', options.map(processMenuOption));
    }

    const hours = mappedValue(record, this.mappings, PARENT, 'hours_of_operation');
    if (isPresent(hours)) setUnder(out, PARENT, 'hours_of_operation', hoursOfOperation(hours));

    return out;
  }

  missingInputFields(record: DataRecord): string[] {
    return missingRequiredSources(record, this.mappings);
  }

  validateInput(record: DataRecord): boolean {
    return this.missingInputFields(record).length === 0;
  }

  validateOutput(record: DataRecord): boolean {
    if (!hasOwn(record, 'name')) {
      this.log.error('Transformed IVR is missing required fields', { fields: ['name'] });
      return false;
    }
    return true;
  }
}
