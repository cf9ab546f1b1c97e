/**
 * RingCentral users to Zoom users
 *
 * `contact` is folded into `user_info` and removed. The source `type` is
 * carried over as-is.
 */

import type {
  DataRecord,
  EntityKind,
  EntityTransformer,
  Logger,
  TransformationSettings,
  TransformerDeps,
} from '@callbridge/core';
import { asRecord, asString, getField, isPlainObject, isPresent } from '@callbridge/core';
import { loadSettings } from '../../config/transformation-config.js';
import { timezoneToIana } from '../../rules/index.js';
import { formatExtensionNumber, missingPaths } from '../support.js';

const DEFAULT_USER_TYPE = 1;

export class RingCentralUsersTransformer implements EntityTransformer {
  readonly jobTypeCode: string = 'rc_zoom_users';
  readonly jobTypeId: number = 39;
  readonly entity: EntityKind = 'user';
  readonly removedFields: readonly string[] = ['contact'];
  readonly rewrittenFields: readonly string[] = ['user_info', 'extensionNumber'];

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
    const userInfo: DataRecord = { ...asRecord(record.user_info) };

    if (isPlainObject(record.contact)) {
      const contact = record.contact;
      userInfo.first_name = asString(contact.firstName) ?? '';
      userInfo.last_name = asString(contact.lastName) ?? '';
      userInfo.email = asString(contact.email) ?? '';
      userInfo.phone_number = asString(contact.businessPhone) ?? '';
      userInfo.timezone = timezoneToIana(getField(record, 'regionalSettings.timezone'));
      delete out.contact;
    }

    userInfo.type = isPresent(record.type) ? record.type : DEFAULT_USER_TYPE;
    out.user_info = userInfo;

    formatExtensionNumber(out, this.settings);
    this.log.debug('Transformed user', { id: record.id });
    return out;
  }

  missingInputFields(record: DataRecord): string[] {
    const missing = missingPaths(record, ['id']);
    if (!isPlainObject(record.contact)) {
      missing.push('contact');
    } else {
      missing.push(...missingPaths(record, ['contact.email']));
    }
    return missing;
  }

  validateInput(record: DataRecord): boolean {
    return this.missingInputFields(record).length === 0;
  }

  validateOutput(record: DataRecord): boolean {
    const missing = missingPaths(record, ['user_info.first_name', 'user_info.last_name', 'user_info.email']);
    if (missing.length > 0) {
      this.log.error('Transformed user is missing required fields', { fields: missing });
      return false;
    }
    if ('contact' in record) {
      this.log.warn('contact still present after transform', { id: record.id });
    }
    return true;
  }
}
