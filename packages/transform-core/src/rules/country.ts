/**
 * Country normalization
 */

import { getLogger } from '@callbridge/core';

const log = getLogger('rules.country');

const COUNTRY_TO_ISO: Readonly<Record<string, string>> = {
  'United States': 'US',
  'United States of America': 'US',
  USA: 'US',
  US: 'US',
  Canada: 'CA',
  'United Kingdom': 'GB',
  'Great Britain': 'GB',
  UK: 'GB',
  Australia: 'AU',
  Germany: 'DE',
  France: 'FR',
  Japan: 'JP',
  China: 'CN',
  India: 'IN',
  Brazil: 'BR',
  Mexico: 'MX',
};

/**
 * Common country name or abbreviation to ISO 3166-1 alpha-2.
 * Unknown names come back unchanged.
 */
export function countryToIso(name: string): string {
  if (!name) return name;
  const iso = COUNTRY_TO_ISO[name];
  if (iso === undefined) {
    log.debug('Country not in lookup table, passing through', { country: name });
    return name;
  }
  return iso;
}

/**
 * Dialpad country values: lower-case `us`/`ca` are accepted, known names
 * map through the common table, anything else is upper-cased.
 */
export function mapDialpadCountry(country: string): string {
  if (!country) return '';
  const lower = country.toLowerCase();
  if (lower === 'us') return 'US';
  if (lower === 'ca') return 'CA';
  return COUNTRY_TO_ISO[country] ?? country.toUpperCase();
}
