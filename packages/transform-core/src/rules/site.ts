/**
 * Site naming rules
 */

import { getLogger } from '@callbridge/core';

const log = getLogger('rules.site');

export const AR_NAME_SUFFIX = ' (NIU)';
export const AR_NAME_MAX_LENGTH = 30;
export const SITE_CODE_MAX_LENGTH = 20;

/**
 * Upper-case, spaces and hyphens to `_`, everything else non-alphanumeric
 * dropped, truncated to `maxLength`.
 */
export function buildSiteCode(name: string, maxLength: number = SITE_CODE_MAX_LENGTH): string {
  return name
    .toUpperCase()
    .replace(/[\s-]/g, '_')
    .replace(/[^A-Z0-9_]/g, '')
    .slice(0, maxLength);
}

/**
 * Auto receptionist name for a site: the site name plus a suffix. When the
 * result is too long the base name is cut, never the suffix.
 */
export function buildAutoReceptionistName(
  siteName: string,
  maxLength: number = AR_NAME_MAX_LENGTH,
  suffix: string = AR_NAME_SUFFIX
): string {
  const clean = siteName.trim();
  if (!clean) {
    log.warn('Invalid site name for auto receptionist', { siteName });
    return `Unknown${suffix}`.slice(0, maxLength);
  }

  const full = clean + suffix;
  if (full.length <= maxLength) return full;

  const available = maxLength - suffix.length;
  if (available <= 0) {
    log.warn('Suffix longer than the name limit', { suffix, maxLength });
    return suffix.slice(0, maxLength);
  }
  return clean.slice(0, available).trimEnd() + suffix;
}

export type ArNameCheck =
  | { valid: true; length: number; maxLength: number; remainingChars: number }
  | { valid: false; reason: string; length: number; maxLength: number; excessChars?: number };

export function validateArNameLength(name: string, maxLength: number = AR_NAME_MAX_LENGTH): ArNameCheck {
  if (!name) {
    return { valid: false, reason: 'AR name is empty', length: 0, maxLength };
  }
  if (name.length > maxLength) {
    return {
      valid: false,
      reason: `AR name exceeds ${maxLength} character limit`,
      length: name.length,
      maxLength,
      excessChars: name.length - maxLength,
    };
  }
  return { valid: true, length: name.length, maxLength, remainingChars: maxLength - name.length };
}
