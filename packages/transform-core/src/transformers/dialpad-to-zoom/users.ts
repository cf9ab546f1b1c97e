/**
 * Dialpad users to Zoom users, emitted in the transformed RingCentral user
 * shape (`user_info` plus the RingCentral extension fields).
 */

import type {
  DataRecord,
  EntityKind,
  EntityTransformer,
  Logger,
  TransformationSettings,
  TransformerDeps,
} from '@callbridge/core';
import { asArray, asRecord, asString, isPlainObject } from '@callbridge/core';
import { loadSettings } from '../../config/transformation-config.js';
import { mapDialpadTimezone } from '../../rules/index.js';
import { formatExtensionNumber, missingPaths } from '../support.js';

const STATUS_MAP: Readonly<Record<string, string>> = {
  active: 'Enabled',
  inactive: 'Disabled',
  pending: 'NotActivated',
  suspended: 'Disabled',
};

const COUNTRIES: Readonly<Record<string, { id: string; name: string; isoCode: string }>> = {
  US: { id: '1', name: 'United States', isoCode: 'US' },
  CA: { id: '2', name: 'Canada', isoCode: 'CA' },
  UK: { id: '3', name: 'United Kingdom', isoCode: 'GB' },
  GB: { id: '3', name: 'United Kingdom', isoCode: 'GB' },
};

function numericId(value: unknown): number {
  const id = asString(value);
  return id !== null && /^\d+$/.test(id) ? Number.parseInt(id, 10) : 0;
}

/** `{ id, name }` of the user's office group; users without one land on the main site */
function siteOf(record: DataRecord): DataRecord {
  const office = asArray(record.group_details).find(
    (group) => isPlainObject(group) && group.group_type === 'office'
  );
  if (!isPlainObject(office)) return { id: '', name: 'Main Site' };
  const officeId = asString(office.group_id) ?? '';
  return { id: officeId, name: `Office ${officeId}` };
}

function assignedCountry(country: unknown): DataRecord {
  const code = (asString(country) ?? 'us').toUpperCase();
  const info = COUNTRIES[code] ?? COUNTRIES.US;
  return { uri: `https://dialpad-mock/countries/${info.id}`, ...info };
}

/** `2021-06-20T19:18:00` gets a `Z`; dates without a time part pass through. */
function creationTime(value: unknown): string | null {
  const date = asString(value);
  if (date === null) return null;
  return date.includes('T') && !date.endsWith('Z') ? `${date}Z` : date;
}

function userInfo(record: DataRecord): DataRecord {
  const timezone = asString(record.timezone);
  return {
    first_name: asString(record.first_name) ?? '',
    last_name: asString(record.last_name) ?? '',
    email: asString(asArray(record.emails)[0]) ?? '',
    phone_number: asString(asArray(record.phone_numbers)[0]) ?? '',
    timezone: timezone === null ? null : mapDialpadTimezone(timezone),
    type: 'User',
  };
}

export class DialpadUsersTransformer implements EntityTransformer {
  readonly jobTypeCode: string = 'dialpad_zoom_users';
  readonly jobTypeId: number = 39;
  readonly entity: EntityKind = 'user';
  readonly removedFields: readonly string[] = [];
  readonly rewrittenFields: readonly string[] = [
    'id',
    'extensionNumber',
    'name',
    'type',
    'status',
    'uri',
    'permissions',
    'profileImage',
    'site',
    'hidden',
    'assignedCountry',
    'creationTime',
    'record_id',
    'user_info',
  ];

  private readonly log: Logger;
  private settings: TransformationSettings = {};

  constructor(private readonly deps: TransformerDeps) {
    this.log = deps.logger.child({ jobTypeCode: this.jobTypeCode });
  }

  async initialize(): Promise<void> {
    this.settings = await loadSettings(this.deps.configLoader, this.jobTypeCode, this.log);
  }

  transform(record: DataRecord): DataRecord {
    const state = asString(record.state) ?? 'active';
    const imageUrl = asString(record.image_url);

    const out: DataRecord = {
      ...record,
      id: numericId(record.id),
      extensionNumber: record.extension ?? '',
      name: record.display_name ?? '',
      type: 'User',
      status: STATUS_MAP[state] ?? 'Enabled',
      uri: `https://dialpad-api/users/${asString(record.id) ?? ''}`,
      permissions: {
        admin: { enabled: record.is_admin === true || record.is_super_admin === true },
        internationalCalling: { enabled: record.international_dialing_enabled === true },
      },
      profileImage: {
        uri: imageUrl ?? `https://dialpad-mock/users/${asString(record.id) ?? ''}/profile-image`,
      },
      site: siteOf(record),
      hidden: record.do_not_disturb === true,
      assignedCountry: assignedCountry(record.country),
      creationTime: creationTime(record.date_added),
      record_id: record.record_id ?? '',
      user_info: { ...asRecord(record.user_info), ...userInfo(record) },
    };

    formatExtensionNumber(out, this.settings);
    return out;
  }

  missingInputFields(record: DataRecord): string[] {
    return missingPaths(record, ['id', 'emails']);
  }

  validateInput(record: DataRecord): boolean {
    return this.missingInputFields(record).length === 0;
  }

  validateOutput(record: DataRecord): boolean {
    const missing = missingPaths(record, ['user_info.email']);
    if (missing.length > 0) {
      this.log.error('Transformed user is missing required fields', { fields: missing });
      return false;
    }
    return true;
  }
}
