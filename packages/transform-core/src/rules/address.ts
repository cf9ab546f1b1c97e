/**
 * Address helpers
 */

import { asRecord, asString } from '@callbridge/core';
import type { DataRecord } from '@callbridge/core';
import { countryToIso } from './country.js';

const INNER_ABBREVIATIONS = [
  'Po', 'Ne', 'Nw', 'Se', 'Sw', 'Ct', 'St', 'Ave', 'Blvd', 'Dr', 'Ln', 'Rd', 'Apt', 'Ste',
];

const TRAILING_ABBREVIATIONS = ['Ct', 'St', 'Ave', 'Blvd', 'Dr', 'Ln', 'Rd'];

function titleCase(value: string): string {
  return value.replace(/[A-Za-z]+/g, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

/**
 * Title-case an address line, keeping postal abbreviations upper-case:
 * `"123 main st"` becomes `"123 Main ST"`.
 */
export function normalizeAddressField(value: string): string {
  if (!value) return value;

  let normalized = titleCase(value);
  for (const abbr of INNER_ABBREVIATIONS) {
    normalized = normalized.split(` ${abbr} `).join(` ${abbr.toUpperCase()} `);
  }
  for (const abbr of TRAILING_ABBREVIATIONS) {
    if (normalized.endsWith(` ${abbr}`)) {
      normalized = `${normalized.slice(0, -abbr.length)}${abbr.toUpperCase()}`;
    }
  }
  return normalized;
}

export interface EmergencyAddress {
  address_line1: string | null;
  address_line2?: string;
  city: string | null;
  state_code: string | null;
  zip: string | null;
  country: string | null;
}

/**
 * Source address object (`street`, `city`, `state`, `zip`, `country`) to the
 * target's emergency address shape.
 */
export function toEmergencyAddress(address: unknown): EmergencyAddress {
  const source: DataRecord = asRecord(address);
  const country = asString(source.country);
  const result: EmergencyAddress = {
    address_line1: asString(source.street),
    city: asString(source.city),
    state_code: asString(source.state),
    zip: asString(source.zip),
    country: country === null ? null : countryToIso(country),
  };
  const street2 = asString(source.street2);
  if (street2 !== null) {
    result.address_line2 = street2;
  }
  return result;
}
