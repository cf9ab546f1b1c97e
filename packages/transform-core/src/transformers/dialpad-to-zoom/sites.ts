/**
 * Dialpad offices to Zoom sites, in the shape RingCentral sites have after
 * their own transform so one loader handles both.
 */

import type {
  DataRecord,
  EntityKind,
  EntityTransformer,
  Logger,
  TransformationSettings,
  TransformerDeps,
} from '@callbridge/core';
import { asRecord, asString, isPresent } from '@callbridge/core';
import { loadSettings } from '../../config/transformation-config.js';
import { ianaToRingCentralId, mapDialpadCountry, mapDialpadTimezone } from '../../rules/index.js';
import type { EmergencyAddress } from '../../rules/index.js';
import { augmentSite, missingPaths } from '../support.js';

const TIMEZONE_DETAILS: Readonly<Record<string, { description: string; bias: string }>> = {
  'Pacific/Honolulu': { description: 'Hawaii', bias: '-600' },
  'America/Anchorage': { description: 'Alaska', bias: '-540' },
  'America/Los_Angeles': { description: 'Pacific Time (US & Canada)', bias: '-480' },
  'America/Phoenix': { description: 'Arizona', bias: '-420' },
  'America/Denver': { description: 'Mountain Time (US & Canada)', bias: '-420' },
  'America/Chicago': { description: 'Central Time (US & Canada)', bias: '-360' },
  'America/New_York': { description: 'Eastern Time (US & Canada)', bias: '-300' },
};

const ENGLISH_US = { id: '1033', name: 'English (United States)', localeCode: 'en-US' };

function regionalSettings(timezone: unknown): DataRecord {
  const iana = mapDialpadTimezone(timezone);
  const details = TIMEZONE_DETAILS[iana] ?? { description: iana, bias: '0' };
  return {
    timezone: {
      uri: `https://dialpad-mock/timezones/${iana}`,
      id: ianaToRingCentralId(iana),
      name: iana,
      description: details.description,
      bias: details.bias,
    },
    homeCountry: {
      uri: 'https://dialpad-mock/countries/1',
      id: '1',
      name: 'United States',
      isoCode: 'US',
      callingCode: '1',
    },
    language: { ...ENGLISH_US },
    greetingLanguage: { ...ENGLISH_US },
    formattingLocale: { ...ENGLISH_US },
    timeFormat: '24h',
  };
}

function emergencyAddress(e911: DataRecord): EmergencyAddress {
  return {
    address_line1: asString(e911.address) ?? '',
    city: asString(e911.city) ?? '',
    state_code: asString(e911.state) ?? '',
    zip: asString(e911.zip) ?? '',
    country: mapDialpadCountry(asString(e911.country) ?? ''),
  };
}

export class DialpadSitesTransformer implements EntityTransformer {
  readonly jobTypeCode: string = 'dialpad_zoom_sites';
  readonly jobTypeId: number = 33;
  readonly entity: EntityKind = 'site';
  readonly removedFields: readonly string[] = ['e911_address'];
  readonly rewrittenFields: readonly string[] = [
    'id',
    'name',
    'uri',
    'extensionNumber',
    'regionalSettings',
    'siteAccess',
    'callerIdName',
    'record_id',
    'default_emergency_address',
    'site_code',
    'auto_receptionist_name',
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
    const id = asString(record.id) ?? '';
    const name = asString(record.name) ?? '';
    const out: DataRecord = {
      ...record,
      id: record.id ?? '',
      name,
      uri: `https://dialpad-api/offices/${id}`,
      extensionNumber: record.office_id ?? record.id ?? '',
      regionalSettings: regionalSettings(record.timezone),
      siteAccess: 'Unlimited',
      callerIdName: name.toUpperCase(),
      record_id: record.record_id ?? '',
    };
    delete out.e911_address;

    const e911 = asRecord(record.e911_address);
    if (isPresent(e911)) {
      out.default_emergency_address = emergencyAddress(e911);
    }
    augmentSite(out, undefined, this.settings, this.log);
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
    if ('e911_address' in record) {
      this.log.warn('e911_address still present after transform', { id: record.id });
    }
    return true;
  }
}
