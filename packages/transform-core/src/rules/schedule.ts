/**
 * Business hours conversion
 */

import { getLogger, isPlainObject } from '@callbridge/core';

const log = getLogger('rules.schedule');

export const WEEKDAY_NUMBERS: Readonly<Record<string, number>> = {
  sunday: 1,
  monday: 2,
  tuesday: 3,
  wednesday: 4,
  thursday: 5,
  friday: 6,
  saturday: 7,
};

/** `type: 2` marks custom hours on the target */
export interface CustomHoursSetting {
  weekday: number;
  from: string;
  to: string;
  type: 2;
}

/**
 * Flatten `{ Monday: [{from, to}], ... }` into one entry per time range.
 * Day names are case-insensitive; unknown days are skipped with a warning.
 */
export function weeklyRangesToCustomHours(weeklyRanges: unknown): CustomHoursSetting[] {
  if (!isPlainObject(weeklyRanges)) return [];

  const settings: CustomHoursSetting[] = [];
  for (const [day, ranges] of Object.entries(weeklyRanges)) {
    const weekday = WEEKDAY_NUMBERS[day.toLowerCase()];
    if (weekday === undefined) {
      log.warn('Unknown weekday, skipping', { day });
      continue;
    }
    if (!Array.isArray(ranges)) continue;

    for (const range of ranges) {
      if (!isPlainObject(range)) continue;
      const { from, to } = range;
      if (typeof from !== 'string' || typeof to !== 'string') continue;
      settings.push({ weekday, from, to, type: 2 });
    }
  }
  return settings;
}

/**
 * `custom` when the schedule has weekly ranges, a holiday schedule or
 * after-hours handling; otherwise `business_hours`.
 */
export function processHoursType(hours: unknown): 'custom' | 'business_hours' {
  if (!isPlainObject(hours)) {
    log.warn("Invalid hours data, using 'business_hours'");
    return 'business_hours';
  }
  const ranges = hours.weeklyRanges;
  if (isPlainObject(ranges) && Object.keys(ranges).length > 0) return 'custom';
  if ('holidaySchedule' in hours) return 'custom';
  if ('afterHours' in hours || 'closed_hours' in hours) return 'custom';
  return 'business_hours';
}

export interface HoursOfOperation {
  type: 'custom' | 'business_hours';
  custom_hours_settings: CustomHoursSetting[];
}

/** Schedule object (`weeklyRanges`, `holidaySchedule`, ...) to the target's hours block. */
export function hoursOfOperation(hours: unknown): HoursOfOperation {
  return {
    type: processHoursType(hours),
    custom_hours_settings: isPlainObject(hours) ? weeklyRangesToCustomHours(hours.weeklyRanges) : [],
  };
}
