/**
 * Timezone normalization
 *
 * Source platforms describe timezones as numeric ids, display names,
 * abbreviations or IANA names. Everything resolves to an IANA name; input
 * that cannot be recognised falls back to America/Los_Angeles with a warning.
 */

import { asString, getLogger, isPlainObject } from '@callbridge/core';

const log = getLogger('rules.timezone');

export const DEFAULT_TIMEZONE = 'America/Los_Angeles';

const IANA_PREFIXES = ['America/', 'Europe/', 'Asia/', 'Pacific/'];

const NAME_TO_IANA: Readonly<Record<string, string>> = {
  'Pacific Standard Time': 'America/Los_Angeles',
  'Pacific Daylight Time': 'America/Los_Angeles',
  'Mountain Standard Time': 'America/Denver',
  'Mountain Daylight Time': 'America/Denver',
  'Central Standard Time': 'America/Chicago',
  'Central Daylight Time': 'America/Chicago',
  'Eastern Standard Time': 'America/New_York',
  'Eastern Daylight Time': 'America/New_York',
  'Atlantic Standard Time': 'America/Halifax',
  'Atlantic Daylight Time': 'America/Halifax',
  'Alaska Standard Time': 'America/Anchorage',
  'Alaska Daylight Time': 'America/Anchorage',
  'Hawaii Standard Time': 'Pacific/Honolulu',
  'Greenwich Mean Time': 'Europe/London',
  'British Summer Time': 'Europe/London',
  'Central European Time': 'Europe/Paris',
  'Central European Summer Time': 'Europe/Paris',
  'Eastern European Time': 'Europe/Bucharest',
  'Eastern European Summer Time': 'Europe/Bucharest',
  'Japan Standard Time': 'Asia/Tokyo',
  'China Standard Time': 'Asia/Shanghai',
  'Australian Eastern Standard Time': 'Australia/Sydney',
  'Australian Eastern Daylight Time': 'Australia/Sydney',
  UTC: 'UTC',
  GMT: 'UTC',
  PST: 'America/Los_Angeles',
  PDT: 'America/Los_Angeles',
  MST: 'America/Denver',
  MDT: 'America/Denver',
  CST: 'America/Chicago',
  CDT: 'America/Chicago',
  EST: 'America/New_York',
  EDT: 'America/New_York',
};

/** RingCentral numeric timezone ids */
const ID_TO_IANA: Readonly<Record<string, string>> = {
  '58': 'America/New_York',
  '59': 'America/Chicago',
  '60': 'America/Denver',
  '61': 'America/Los_Angeles',
  '62': 'America/Phoenix',
  '63': 'America/Anchorage',
  '64': 'Pacific/Honolulu',
};

const IANA_TO_ID: Readonly<Record<string, string>> = Object.fromEntries(
  Object.entries(ID_TO_IANA).map(([id, iana]) => [iana, id])
);

/** Short display names used in timezone objects */
const COMMON_NAME_TO_IANA: Readonly<Record<string, string>> = {
  'Eastern Time': 'America/New_York',
  'Central Time': 'America/Chicago',
  'Mountain Time': 'America/Denver',
  'Pacific Time': 'America/Los_Angeles',
  'Alaska Time': 'America/Anchorage',
  'Hawaii Time': 'Pacific/Honolulu',
};

const SUBSTRING_HINTS: ReadonlyArray<[string, string]> = [
  ['pacific', 'America/Los_Angeles'],
  ['mountain', 'America/Denver'],
  ['central', 'America/Chicago'],
  ['eastern', 'America/New_York'],
];

const DIALPAD_TO_IANA: Readonly<Record<string, string>> = {
  'US/Pacific': 'America/Los_Angeles',
  'US/Mountain': 'America/Denver',
  'US/Central': 'America/Chicago',
  'US/Eastern': 'America/New_York',
  'US/Alaska': 'America/Anchorage',
  'US/Hawaii': 'Pacific/Honolulu',
};

function isIana(value: string): boolean {
  return value === 'UTC' || (value.includes('/') && IANA_PREFIXES.some((p) => value.startsWith(p)));
}

function fallback(input: unknown, reason: string): string {
  log.warn(`${reason}, defaulting to ${DEFAULT_TIMEZONE}`, { timezone: input });
  return DEFAULT_TIMEZONE;
}

function fromString(value: string): string {
  const trimmed = value.trim();
  if (!trimmed) return fallback(value, 'No timezone provided');
  if (isIana(trimmed)) return trimmed;

  const named = NAME_TO_IANA[trimmed] ?? ID_TO_IANA[trimmed];
  if (named) return named;

  const lower = trimmed.toLowerCase();
  for (const [hint, iana] of SUBSTRING_HINTS) {
    if (lower.includes(hint)) {
      log.debug('Timezone matched by name hint', { timezone: value, hint, iana });
      return iana;
    }
  }

  return fallback(value, 'Unknown timezone format');
}

/**
 * Resolve a timezone value to an IANA name.
 *
 * Accepts an IANA string (returned as-is), a display name or abbreviation,
 * a numeric platform id, or an object carrying `id` and/or `name`. Never
 * throws.
 */
export function timezoneToIana(value: unknown): string {
  if (typeof value === 'number') {
    return ID_TO_IANA[String(value)] ?? fallback(value, 'Unknown timezone id');
  }
  if (typeof value === 'string') {
    return fromString(value);
  }
  if (isPlainObject(value)) {
    const id = asString(value.id);
    if (id !== null) {
      const byId = ID_TO_IANA[id];
      if (byId) return byId;
      log.debug('Timezone id not recognised, trying name', { id });
    }
    const name = asString(value.name);
    if (name !== null) {
      return COMMON_NAME_TO_IANA[name] ?? fromString(name);
    }
    return fallback(value, 'Timezone object without usable id or name');
  }
  return fallback(value, 'No timezone provided');
}

/** IANA name back to the RingCentral numeric id; Eastern when unknown. */
export function ianaToRingCentralId(iana: string): string {
  const id = IANA_TO_ID[iana];
  if (id === undefined) {
    log.warn('Unknown timezone for id lookup, using Eastern', { timezone: iana });
    return '58';
  }
  return id;
}

/** Dialpad `US/<Zone>` names to IANA; IANA input passes through. */
export function mapDialpadTimezone(value: unknown): string {
  const tz = asString(value);
  if (tz === null) return DEFAULT_TIMEZONE;
  return DIALPAD_TO_IANA[tz] ?? timezoneToIana(tz);
}
