/**
 * RingCentral auto receptionists to Zoom auto receptionists
 *
 * The site id (flattened `site.id` key or nested `site: {id}`) is copied to
 * `rc_site_id`, the key the loader resolves site dependencies by.
 */

import type { DataRecord, EntityKind, EntityTransformer, Logger, TransformerDeps } from '@callbridge/core';
import { getField, hasOwn, isPresent } from '@callbridge/core';
import { missingPaths } from '../support.js';

export class RingCentralAutoReceptionistsTransformer implements EntityTransformer {
  readonly jobTypeCode: string = 'rc_zoom_ars';
  readonly jobTypeId: number = 77;
  readonly entity: EntityKind = 'auto_receptionist';
  readonly removedFields: readonly string[] = [];
  readonly rewrittenFields: readonly string[] = ['rc_site_id'];

  private readonly log: Logger;

  constructor(deps: TransformerDeps) {
    this.log = deps.logger.child({ jobTypeCode: this.jobTypeCode });
  }

  transform(record: DataRecord): DataRecord {
    const out: DataRecord = { ...record };
    const siteId = getField(record, 'site.id');
    if (isPresent(siteId)) {
      out.rc_site_id = siteId;
    } else {
      this.log.warn('Auto receptionist has no site id', { id: record.id });
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
      this.log.error('Transformed auto receptionist is missing required fields', { fields: missing });
      return false;
    }
    if (hasOwn(record, 'site.id') && !hasOwn(record, 'rc_site_id')) {
      this.log.warn('site.id present but no rc_site_id generated', { id: record.id });
    }
    return true;
  }
}
