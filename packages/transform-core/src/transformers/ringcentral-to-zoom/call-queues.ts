/**
 * RingCentral call queues to Zoom call queues
 */

import type { DataRecord, EntityKind, EntityTransformer, Logger, TransformerDeps } from '@callbridge/core';
import { customHoursFromBusinessHours, missingPaths } from '../support.js';

export class RingCentralCallQueuesTransformer implements EntityTransformer {
  readonly jobTypeCode: string = 'rc_zoom_call_queues';
  readonly jobTypeId: number = 45;
  readonly entity: EntityKind = 'call_queue';
  readonly removedFields: readonly string[] = [];
  readonly rewrittenFields: readonly string[] = ['custom_hours_settings'];

  private readonly log: Logger;

  constructor(deps: TransformerDeps) {
    this.log = deps.logger.child({ jobTypeCode: this.jobTypeCode });
  }

  transform(record: DataRecord): DataRecord {
    const out: DataRecord = { ...record };
    if (record.business_hours === undefined || record.business_hours === null) {
      return out;
    }

    const customHours = customHoursFromBusinessHours(record.business_hours);
    if (customHours.length > 0) {
      out.custom_hours_settings = customHours;
    } else {
      this.log.debug('Business hours without weekly ranges', { id: record.id });
    }
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
