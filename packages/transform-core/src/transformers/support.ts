/**
 * Helpers shared by entity transformers of more than one source platform
 */

import type { DataRecord, Logger, TransformationSettings } from '@callbridge/core';
import { asRecord, asString, getField, isPlainObject, isPresent } from '@callbridge/core';
import {
  AR_NAME_MAX_LENGTH,
  AR_NAME_SUFFIX,
  SITE_CODE_MAX_LENGTH,
  applyMinimumLength,
  buildAutoReceptionistName,
  buildSiteCode,
  customExtensionFormat,
  normalizeAddressField,
  toEmergencyAddress,
  validateArNameLength,
  weeklyRangesToCustomHours,
} from '../rules/index.js';
import type { CustomHoursSetting, EmergencyAddress } from '../rules/index.js';
import { settingNumber, settingRecord, settingString } from '../config/transformation-config.js';

/** Paths that resolve to nothing usable (`null`, `''`, empty list or object). */
export function missingPaths(record: DataRecord, paths: readonly string[]): string[] {
  return paths.filter((path) => !isPresent(getField(record, path)));
}

/**
 * Add `default_emergency_address`, `site_code` and the derived auto
 * receptionist name to a copied site record.
 */
export function augmentSite(
  record: DataRecord,
  address: unknown,
  settings: TransformationSettings,
  log: Logger
): void {
  if (isPlainObject(address)) {
    const emergency = toEmergencyAddress(address);
    record.default_emergency_address =
      settings.normalize_address === true ? normalizeEmergencyAddress(emergency) : emergency;
  }

  const name = asString(record.name);
  if (name === null) return;

  record.site_code = buildSiteCode(name, settingNumber(settings, 'site_code_max_length', SITE_CODE_MAX_LENGTH));

  if (settings.derive_ar_name === false) return;

  const maxLength = settingNumber(settings, 'ar_name_max_length', AR_NAME_MAX_LENGTH);
  const arName = buildAutoReceptionistName(name, maxLength, settingString(settings, 'ar_name_suffix', AR_NAME_SUFFIX));
  const check = validateArNameLength(arName, maxLength);
  if (!check.valid) {
    log.warn('Derived auto receptionist name rejected', { site: name, reason: check.reason });
    return;
  }
  record.auto_receptionist_name = arName;
}

function normalizeEmergencyAddress(address: EmergencyAddress): EmergencyAddress {
  const normalized: EmergencyAddress = {
    ...address,
    address_line1: address.address_line1 === null ? null : normalizeAddressField(address.address_line1),
    city: address.city === null ? null : normalizeAddressField(address.city),
  };
  if (address.address_line2 !== undefined) {
    normalized.address_line2 = normalizeAddressField(address.address_line2);
  }
  return normalized;
}

/**
 * Weekly ranges of a business hours value, which arrives either as a list
 * (first entry wins) or as a single object.
 */
export function weeklyRangesOf(businessHours: unknown): unknown {
  const first = Array.isArray(businessHours) ? businessHours[0] : businessHours;
  return asRecord(asRecord(first).schedule).weeklyRanges;
}

export function customHoursFromBusinessHours(businessHours: unknown): CustomHoursSetting[] {
  return weeklyRangesToCustomHours(weeklyRangesOf(businessHours));
}

/**
 * Apply `extension_format` from settings to `extensionNumber`, when both
 * exist. With `padding_char` the value is padded; otherwise short
 * extensions get the prefix.
 */
export function formatExtensionNumber(record: DataRecord, settings: TransformationSettings): void {
  const format = settingRecord(settings, 'extension_format');
  const extension = asString(record.extensionNumber);
  if (!format || extension === null) return;

  const minLength = typeof format.min_length === 'number' ? format.min_length : undefined;
  if (typeof format.padding_char === 'string') {
    record.extensionNumber = applyMinimumLength(extension, {
      min_length: minLength,
      padding_char: format.padding_char,
      padding_direction: format.padding_direction === 'right' ? 'right' : 'left',
    });
    return;
  }
  record.extensionNumber = customExtensionFormat(extension, {
    prefix: typeof format.prefix === 'string' ? format.prefix : undefined,
    min_length: minLength,
  });
}
