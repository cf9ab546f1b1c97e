/**
 * RingCentral sites to Zoom sites
 *
 * `businessAddress` is kept alongside the derived
 * `default_emergency_address`.
 */

import type {
  DataRecord,
  EntityKind,
  EntityTransformer,
  Logger,
  TransformationSettings,
  TransformerDeps,
} from '@callbridge/core';
import { hasOwn, isPresent } from '@callbridge/core';
import { loadSettings } from '../../config/transformation-config.js';
import { augmentSite, missingPaths } from '../support.js';

export class RingCentralSitesTransformer implements EntityTransformer {
  readonly jobTypeCode: string = 'rc_zoom_sites';
  readonly jobTypeId: number = 33;
  readonly entity: EntityKind = 'site';
  readonly removedFields: readonly string[] = [];
  readonly rewrittenFields: readonly string[] = ['default_emergency_address', 'site_code', 'auto_receptionist_name'];

  private readonly log: Logger;
  private settings: TransformationSettings = {};

  constructor(private readonly deps: TransformerDeps) {
    this.log = deps.logger.child({ jobTypeCode: this.jobTypeCode });
  }

  async initialize(): Promise<void> {
    this.settings = await loadSettings(this.deps.configLoader, this.jobTypeCode, this.log);
  }

  transform(record: DataRecord): DataRecord {
    const out: DataRecord = { ...record };
    augmentSite(out, record.businessAddress, this.settings, this.log);
    return out;
  }

  missingInputFields(record: DataRecord): string[] {
    return missingPaths(record, ['id', 'name']);
  }

  validateInput(record: DataRecord): boolean {
    return this.missingInputFields(record).length === 0;
  }

  validateOutput(record: DataRecord): boolean {
    const missing = missingPaths(record, ['id', 'name', 'site_code']);
    if (missing.length > 0) {
      this.log.error('Transformed site is missing required fields', { fields: missing });
      return false;
    }
    if (isPresent(record.businessAddress) && !hasOwn(record, 'default_emergency_address')) {
      this.log.warn('Site has a business address but no emergency address', { id: record.id });
    }
    return true;
  }
}
