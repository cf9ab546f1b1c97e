/**
 * Dialpad offices to Zoom auto receptionists
 *
 * Every Dialpad office becomes a Zoom site, so the office id doubles as the
 * site id: `office_id`, `rc_site_id` and the flattened `site.id` key all
 * carry it.
 */

import type { DataRecord, EntityKind, EntityTransformer, Logger, TransformerDeps } from '@callbridge/core';
import { asString, hasOwn } from '@callbridge/core';
import { deterministicExtension } from '../../rules/index.js';
import { missingPaths } from '../support.js';

/** `id`, falling back to `office_id`, as a string */
export function dialpadOfficeId(record: DataRecord): string {
  return asString(record.id) ?? asString(record.office_id) ?? '';
}

export class DialpadAutoReceptionistsTransformer implements EntityTransformer {
  readonly jobTypeCode: string = 'dialpad_zoom_ars';
  readonly jobTypeId: number = 77;
  readonly entity: EntityKind = 'auto_receptionist';
  readonly removedFields: readonly string[] = [];
  readonly rewrittenFields: readonly string[] = [
    'id',
    'name',
    'extensionNumber',
    'site.id',
    'ivr_details',
    'record_id',
    'office_id',
    'rc_site_id',
  ];

  private readonly log: Logger;

  constructor(deps: TransformerDeps) {
    this.log = deps.logger.child({ jobTypeCode: this.jobTypeCode });
  }

  transform(record: DataRecord): DataRecord {
    const officeId = dialpadOfficeId(record);
    const name = asString(record.name) ?? '';
    const extensionNumber = deterministicExtension(officeId, 'ar');

    return {
      ...record,
      id: officeId,
      name,
      extensionNumber,
      'site.id': officeId,
      ivr_details: [
        {
          uri: `https://dialpad-api/offices/${officeId}/ivr`,
          id: officeId,
          name,
          extensionNumber: asString(record.office_id) ?? officeId,
          prompt: {
            mode: 'TextToSpeech',
            text: `Thank you for calling ${name || 'our office'}.`,
            language: {
              uri: 'https://platform.ringcentral.com/restapi/v1.0/dictionary/language/1033',
              id: '1033',
              name: 'English (United States)',
              localeCode: 'en_US',
            },
          },
          site: { id: officeId },
        },
      ],
      record_id: record.record_id ?? `dialpad_office_${officeId || 'unknown'}`,
      office_id: officeId,
      rc_site_id: officeId,
    };
  }

  missingInputFields(record: DataRecord): string[] {
    const missing = missingPaths(record, ['name']);
    if (dialpadOfficeId(record) === '') missing.unshift('id');
    return missing;
  }

  validateInput(record: DataRecord): boolean {
    return this.missingInputFields(record).length === 0;
  }

  validateOutput(record: DataRecord): boolean {
    const missing = ['id', 'name', 'extensionNumber', 'site.id'].filter((key) => !asString(record[key]));
    if (missing.length > 0) {
      this.log.error('Transformed auto receptionist is missing required fields', { fields: missing });
      return false;
    }
    if (!hasOwn(record, 'rc_site_id')) {
      this.log.warn('site.id present but no rc_site_id generated', { id: record.id });
    }
    return true;
  }
}
