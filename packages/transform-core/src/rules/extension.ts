/**
 * Extension number helpers
 */

import { createHash } from 'node:crypto';
import { getLogger } from '@callbridge/core';

const log = getLogger('rules.extension');

export type ExtensionClass = 'ar' | 'cq' | (string & {});

/** Inclusive bands per class; classes never share a band. */
const EXTENSION_BANDS: Readonly<Record<string, readonly [number, number]>> = {
  cq: [200, 299],
  ar: [300, 399],
};

const DEFAULT_BAND: readonly [number, number] = [400, 999];

/** mulberry32: small seeded PRNG, enough for spreading ids over a band */
function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Reproducible 3-digit extension for an entity. The same id and class
 * always give the same number; `cq` draws from 200-299, `ar` from 300-399
 * and any other class from 400-999.
 */
export function deterministicExtension(entityId: string | number, extensionClass: ExtensionClass): string {
  const digest = createHash('sha256').update(`${entityId}_${extensionClass}`).digest();
  const random = mulberry32(digest.readUInt32BE(0));
  const [low, high] = EXTENSION_BANDS[extensionClass] ?? DEFAULT_BAND;
  const extension = low + Math.floor(random() * (high - low + 1));
  log.debug('Synthesised extension', { entityId, extensionClass, extension });
  return String(extension);
}

export interface MinimumLengthOptions {
  min_length?: number;
  padding_char?: string;
  padding_direction?: 'left' | 'right';
}

/** Pad a value to a minimum length (default: 3, left-padded with `0`). */
export function applyMinimumLength(value: string | number, options: MinimumLengthOptions = {}): string {
  const str = String(value);
  const minLength = options.min_length ?? 3;
  const pad = options.padding_char ?? '0';
  if (str.length >= minLength) return str;
  return options.padding_direction === 'right' ? str.padEnd(minLength, pad) : str.padStart(minLength, pad);
}

export interface ExtensionFormatOptions {
  prefix?: string;
  min_length?: number;
}

/**
 * Lift short extensions to the minimum length: a single digit gets the
 * whole prefix (`2` to `102`), two digits get its first character (`25` to
 * `125`). Anything else is returned trimmed.
 */
export function customExtensionFormat(value: string | number, options: ExtensionFormatOptions = {}): string {
  const str = String(value).trim();
  const prefix = options.prefix ?? '10';
  const minLength = options.min_length ?? 3;

  if (str.length >= minLength) return str;
  if (/^\d$/.test(str)) return prefix + str;
  if (/^\d{2}$/.test(str)) return prefix.charAt(0) + str;

  log.warn('Could not format extension, returning as-is', { extension: str });
  return str;
}
