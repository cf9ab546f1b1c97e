/**
 * User field helpers
 */

import { getLogger, isPlainObject } from '@callbridge/core';

const log = getLogger('rules.user');

export interface PhoneNumberEntry {
  number: string;
  type: 'office' | 'home' | 'mobile';
}

const PHONE_TYPES: Readonly<Record<string, PhoneNumberEntry['type']>> = {
  work: 'office',
  business: 'office',
  direct: 'office',
  home: 'home',
  mobile: 'mobile',
};

/** `{number, type}` list; unknown types become `office`, entries without a number are dropped. */
export function formatUserPhoneNumbers(phoneNumbers: unknown): PhoneNumberEntry[] {
  if (!Array.isArray(phoneNumbers)) {
    if (phoneNumbers !== undefined && phoneNumbers !== null) {
      log.warn('phone_numbers is not a list', { received: typeof phoneNumbers });
    }
    return [];
  }

  const formatted: PhoneNumberEntry[] = [];
  for (const entry of phoneNumbers) {
    if (!isPlainObject(entry)) continue;
    const number = entry.number;
    if (typeof number !== 'string' && typeof number !== 'number') continue;
    if (number === '') continue;
    const type = typeof entry.type === 'string' ? entry.type.toLowerCase() : '';
    formatted.push({ number: String(number), type: PHONE_TYPES[type] ?? 'office' });
  }
  return formatted;
}

export function concatDisplayName(firstName: string, lastName: string): string {
  return [firstName, lastName].filter((part) => part.length > 0).join(' ');
}
