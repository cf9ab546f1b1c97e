/**
 * SSOT call queues to Zoom call queues
 */

import type { DataRecord, EntityKind, EntityTransformer, Logger, TransformerDeps } from '@callbridge/core';
import { asRecord } from '@callbridge/core';
import { processHoursType } from '../../rules/index.js';
import { customHoursFromBusinessHours, missingPaths } from '../support.js';

export class SsotCallQueuesTransformer implements EntityTransformer {
  readonly jobTypeCode: string = 'ssot_to_zoom_call_queues';
  readonly jobTypeId: number = 45;
  readonly entity: EntityKind = 'call_queue';
  readonly removedFields: readonly string[] = [];
  readonly rewrittenFields: readonly string[] = ['custom_hours_settings', 'hours_type'];

  private readonly log: Logger;

  constructor(deps: TransformerDeps) {
    this.log = deps.logger.child({ jobTypeCode: this.jobTypeCode });
  }

  transform(record: DataRecord): DataRecord {
    const out: DataRecord = { ...record };
    const businessHours = record.business_hours;
    if (businessHours === undefined || businessHours === null) {
      return out;
    }

    const customHours = customHoursFromBusinessHours(businessHours);
    if (customHours.length > 0) {
      out.custom_hours_settings = customHours;
    }
    const first = Array.isArray(businessHours) ? businessHours[0] : businessHours;
    out.hours_type = processHoursType(asRecord(first).schedule);
    this.log.debug('Transformed call queue', { id: record.id, hoursType: out.hours_type });
    return out;
  }

  missingInputFields(record: DataRecord): string[] {
    return missingPaths(record, ['id', 'name']);
  }

  validateInput(record: DataRecord): boolean {
    return this.missingInputFields(record).length === 0;
  }

  validateOutput(record: DataRecord): boolean {
    const missing = missingPaths(record, ['id', 'name']);
    if (missing.length > 0) {
      this.log.error('Transformed call queue is missing required fields', { fields: missing });
      return false;
    }
    return true;
  }
}
