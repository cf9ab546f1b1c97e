/**
 * SSOT auto attendants to Zoom auto receptionists
 *
 * Driven by field-mapping rows (job type 77, entity `auto_receptionist`):
 * dotted targets are nested under `auto_receptionist`, then hours and
 * prompt values are rewritten into the target's shapes.
 */

import type {
  DataRecord,
  EntityKind,
  EntityTransformer,
  FieldMapping,
  Logger,
  TransformerDeps,
} from '@callbridge/core';
import { ValidationError, asRecord, hasOwn, isPresent } from '@callbridge/core';
import { FieldMappingApplier } from '../../mapping/field-mapping-applier.js';
import { hoursOfOperation, processAudioPrompt } from '../../rules/index.js';
import { loadFieldMappings, mappedValue, missingRequiredSources, rootTargets, setUnder } from './mappings.js';

const PARENT = 'auto_receptionist';

export class SsotAutoReceptionistsTransformer implements EntityTransformer {
  readonly jobTypeCode: string = 'ssot_to_zoom_auto_receptionists';
  readonly jobTypeId: number = 77;
  readonly entity: EntityKind = 'auto_receptionist';
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

    const hours = mappedValue(record, this.mappings, PARENT, 'hours_of_operation');
    if (isPresent(hours)) setUnder(out, PARENT, 'hours_of_operation', hoursOfOperation(hours));

    const prompt = processAudioPrompt(mappedValue(record, this.mappings, PARENT, 'prompt'));
    if (prompt !== null) setUnder(out, PARENT, 'prompt', prompt);

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
      this.log.error('Transformed auto receptionist is missing required fields', { fields: ['name'] });
      return false;
    }
    return true;
  }
}
