/**
 * Dialpad call centers to Zoom call queues, in the transformed RingCentral
 * call queue shape. Dialpad keeps hours as `monday_hours: ["08:00", "18:00"]`
 * per weekday; these become `business_hours[0].schedule.weeklyRanges`.
 */

import type { DataRecord, EntityKind, EntityTransformer, Logger, TransformerDeps } from '@callbridge/core';
import { asArray, asString } from '@callbridge/core';
import { deterministicExtension } from '../../rules/index.js';
import { customHoursFromBusinessHours, missingPaths } from '../support.js';

const WEEKDAY_FIELDS: ReadonlyArray<[string, string]> = [
  ['monday_hours', 'monday'],
  ['tuesday_hours', 'tuesday'],
  ['wednesday_hours', 'wednesday'],
  ['thursday_hours', 'thursday'],
  ['friday_hours', 'friday'],
];

const QUEUE_STATUS: Readonly<Record<string, string>> = {
  active: 'Enabled',
  inactive: 'Disabled',
  suspended: 'NotActivated',
};

function weeklyRanges(record: DataRecord): DataRecord {
  const ranges: DataRecord = {};
  for (const [field, day] of WEEKDAY_FIELDS) {
    const hours = asArray(record[field]);
    const from = asString(hours[0]);
    const to = asString(hours[1]);
    if (from !== null && to !== null) {
      ranges[day] = [{ from, to }];
    }
  }
  return ranges;
}

export class DialpadCallQueuesTransformer implements EntityTransformer {
  readonly jobTypeCode: string = 'dialpad_zoom_call_queues';
  readonly jobTypeId: number = 45;
  readonly entity: EntityKind = 'call_queue';
  readonly removedFields: readonly string[] = [];
  readonly rewrittenFields: readonly string[] = [
    'uri',
    'extensionNumber',
    'site',
    'members',
    'queue_settings',
    'business_hours',
    'greetings',
    'call_handling',
    'answering_rules',
    'record_id',
    'custom_hours_settings',
  ];

  private readonly log: Logger;

  constructor(deps: TransformerDeps) {
    this.log = deps.logger.child({ jobTypeCode: this.jobTypeCode });
  }

  transform(record: DataRecord): DataRecord {
    const id = asString(record.id) ?? asString(record.office_id) ?? '';
    const name = asString(record.name) ?? '';
    const extensionNumber = deterministicExtension(id, 'cq');
    const site = { id: record.office_id ?? '', name };
    const ranges = weeklyRanges(record);
    const businessHours = [
      {
        uri: `https://dialpad-api/callqueues/${id}/business-hours`,
        schedule: Object.keys(ranges).length > 0 ? { weeklyRanges: ranges } : {},
      },
    ];

    const out: DataRecord = {
      ...record,
      uri: `https://dialpad-api/callqueues/${id}`,
      extensionNumber,
      site,
      members: [],
      queue_settings: [
        {
          id: record.id ?? '',
          name,
          extensionNumber,
          status: QUEUE_STATUS[asString(record.state) ?? 'active'] ?? 'Enabled',
          editableMemberStatus: false,
          site: { ...site },
        },
      ],
      business_hours: businessHours,
      greetings: [],
      call_handling: [],
      answering_rules: [
        {
          uri: `https://dialpad-api/callqueues/${id}/answering-rule/after-hours-rule`,
          id: 'after-hours-rule',
          type: 'AfterHours',
          enabled: true,
        },
        {
          uri: `https://dialpad-api/callqueues/${id}/answering-rule/business-hours-rule`,
          id: 'business-hours-rule',
          type: 'BusinessHours',
          enabled: true,
        },
      ],
      record_id: record.record_id ?? '',
    };

    const customHours = customHoursFromBusinessHours(businessHours);
    if (customHours.length > 0) {
      out.custom_hours_settings = customHours;
    }
    this.log.debug('Transformed call queue', { id, extensionNumber });
    return out;
  }

  missingInputFields(record: DataRecord): string[] {
    return missingPaths(record, ['id', 'name']);
  }

  validateInput(record: DataRecord): boolean {
    return this.missingInputFields(record).length === 0;
  }

  validateOutput(record: DataRecord): boolean {
    const missing = missingPaths(record, ['id', 'name', 'extensionNumber']);
    if (missing.length > 0) {
      this.log.error('Transformed call queue is missing required fields', { fields: missing });
      return false;
    }
    return true;
  }
}
