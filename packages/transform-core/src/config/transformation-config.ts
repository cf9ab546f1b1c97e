/**
 * Transformation config parsing and typed access
 *
 * Configs are free-form YAML mappings, one per job type. A config that is
 * missing, unreadable or not a mapping behaves like an empty one.
 */

import { parse } from 'yaml';
import type { Logger, TransformationConfigLoader, TransformationSettings } from '@callbridge/core';
import { getLogger, isPlainObject } from '@callbridge/core';

const log = getLogger('transformation-config');

/** Parse YAML text into settings; `{}` on any problem. */
export function parseTransformationConfig(text: string | null | undefined, source = 'inline'): TransformationSettings {
  if (!text || !text.trim()) return {};

  let parsed: unknown;
  try {
    parsed = parse(text);
  } catch (error) {
    log.warn('Transformation config is not valid YAML, using defaults', {
      source,
      error: error instanceof Error ? error.message : String(error),
    });
    return {};
  }

  if (!isPlainObject(parsed)) {
    log.warn('Transformation config is not a mapping, using defaults', { source });
    return {};
  }
  return parsed;
}

/**
 * Fetch settings for a job type; loader failures are logged and treated
 * as "no config".
 */
export async function loadSettings(
  loader: TransformationConfigLoader,
  jobTypeCode: string,
  logger: Logger
): Promise<TransformationSettings> {
  try {
    return await loader.getTransformationConfig(jobTypeCode);
  } catch (error) {
    logger.warn('Transformation config unavailable, using defaults', {
      jobTypeCode,
      error: error instanceof Error ? error.message : String(error),
    });
    return {};
  }
}

export function settingNumber(settings: TransformationSettings, key: string, fallback: number): number {
  const value = settings[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

export function settingString(settings: TransformationSettings, key: string, fallback: string): string {
  const value = settings[key];
  return typeof value === 'string' ? value : fallback;
}

export function settingStringList(settings: TransformationSettings, key: string): string[] | undefined {
  const value = settings[key];
  if (!Array.isArray(value)) return undefined;
  return value.filter((v): v is string => typeof v === 'string').map((v) => v.toLowerCase());
}

export function settingRecord(settings: TransformationSettings, key: string): TransformationSettings | undefined {
  const value = settings[key];
  return isPlainObject(value) ? value : undefined;
}
