/**
 * SSOT users to Zoom users
 *
 * Each `user_info` field comes from the field mapping targeting it (job
 * type 39, entity `user`, target `user_info.<field>` or `<field>`), else
 * from the flat snake_case or camelCase column. The flat name and phone
 * columns are removed once folded; mapped source columns stay.
 */

import type {
  DataRecord,
  EntityKind,
  EntityTransformer,
  FieldMapping,
  Logger,
  TransformationSettings,
  TransformerDeps,
} from '@callbridge/core';
import { asString, isPresent } from '@callbridge/core';
import { loadSettings, settingNumber } from '../../config/transformation-config.js';
import { concatDisplayName, formatUserPhoneNumbers, mapUserType, timezoneToIana } from '../../rules/index.js';
import { formatExtensionNumber, missingPaths } from '../support.js';
import { loadFieldMappings, mappedValue } from './mappings.js';

const USER_INFO = 'user_info';

const FOLDED_FIELDS = [
  'first_name',
  'firstName',
  'last_name',
  'lastName',
  'phone_number',
  'phoneNumber',
  'business_phone',
] as const;

function firstString(record: DataRecord, keys: readonly string[]): string | null {
  for (const key of keys) {
    const value = asString(record[key]);
    if (value !== null) return value;
  }
  return null;
}

export class SsotUsersTransformer implements EntityTransformer {
  readonly jobTypeCode: string = 'ssot_to_zoom_users';
  readonly jobTypeId: number = 39;
  readonly entity: EntityKind = 'user';
  readonly removedFields: readonly string[] = FOLDED_FIELDS;
  readonly rewrittenFields: readonly string[] = [
    'user_info',
    'phone_numbers',
    'display_name',
    'status',
    'extensionNumber',
  ];

  private readonly log: Logger;
  private settings: TransformationSettings = {};
  private mappings: FieldMapping[] = [];

  constructor(private readonly deps: TransformerDeps) {
    this.log = deps.logger.child({ jobTypeCode: this.jobTypeCode });
  }

  async initialize(): Promise<void> {
    this.settings = await loadSettings(this.deps.configLoader, this.jobTypeCode, this.log);
    this.mappings = await loadFieldMappings(this.deps.fieldMappings, this.jobTypeId, this.entity, this.log);
  }

  transform(record: DataRecord): DataRecord {
    const out: DataRecord = { ...record };
    const firstName = this.text(record, 'first_name', ['first_name', 'firstName']);
    const lastName = this.text(record, 'last_name', ['last_name', 'lastName']);

    const userInfo: DataRecord = {
      first_name: firstName,
      last_name: lastName,
      email: this.text(record, 'email', ['email']),
      phone_number: this.text(record, 'phone_number', ['phone_number', 'phoneNumber', 'business_phone']),
      type: this.userType(this.source(record, 'type') ?? record.user_type),
    };
    const timezone = this.source(record, 'timezone') ?? record.timezone;
    if (isPresent(timezone)) {
      userInfo.timezone = timezoneToIana(timezone);
    }

    for (const field of FOLDED_FIELDS) {
      delete out[field];
    }
    out.user_info = userInfo;

    const phoneNumbers = formatUserPhoneNumbers(record.phone_numbers);
    if (phoneNumbers.length > 0) {
      out.phone_numbers = phoneNumbers;
    }

    const displayName = concatDisplayName(firstName, lastName);
    if (displayName) {
      out.display_name = displayName;
    }
    out.status = 'active';

    formatExtensionNumber(out, this.settings);
    return out;
  }

  /** Value of the mapping targeting a `user_info` field, when one exists */
  private source(record: DataRecord, field: string): unknown {
    return mappedValue(record, this.mappings, USER_INFO, field);
  }

  private text(record: DataRecord, field: string, columns: readonly string[]): string {
    return asString(this.source(record, field)) ?? firstString(record, columns) ?? '';
  }

  private userType(value: unknown): number {
    if (typeof value === 'number' && Number.isInteger(value)) return value;
    const name = asString(value);
    if (name !== null) return mapUserType(name);
    return settingNumber(this.settings, 'default_user_type', 1);
  }

  missingInputFields(record: DataRecord): string[] {
    const missing = missingPaths(record, ['id']);
    if (this.text(record, 'email', ['email']) === '') missing.push('email');
    return missing;
  }

  validateInput(record: DataRecord): boolean {
    return this.missingInputFields(record).length === 0;
  }

  validateOutput(record: DataRecord): boolean {
    const missing = missingPaths(record, [
      'user_info.first_name',
      'user_info.last_name',
      'user_info.email',
      'user_info.type',
    ]);
    if (missing.length > 0) {
      this.log.error('Transformed user is missing required fields', { fields: missing });
      return false;
    }
    return true;
  }
}
