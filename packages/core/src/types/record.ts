/**
 * Record types exchanged between source platforms, transformers and loaders
 */

/** Untyped nested JSON-like record, as extracted from a source platform */
export type DataRecord = {
  [key: string]: unknown;
};
