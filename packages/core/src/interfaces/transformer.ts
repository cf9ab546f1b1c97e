/**
 * Entity Transformer contract
 *
 * One implementation per (source platform, entity). Implementations follow
 * copy-all-then-augment: every input key survives unless it is listed in
 * `removedFields`, and keeps its value unless it is listed in
 * `rewrittenFields`.
 */

import type { DataRecord, EntityKind } from '../types/index.js';
import type { Logger } from '../logging/logger.js';
import type { FieldMappingStore, TransformationConfigLoader } from './stores.js';

/** Per-call context handed down from the dispatcher */
export interface TransformContext {
  /** Correlates log lines for one request or batch */
  traceId?: string;
  /** Migration job group the record belongs to; tagged on log lines */
  jobGroupId?: number;
}

export interface EntityTransformer {
  readonly jobTypeCode: string;
  readonly jobTypeId: number;
  readonly entity: EntityKind;
  /** Top-level input keys deleted from the output */
  readonly removedFields: readonly string[];
  /**
   * Top-level keys the transformer writes derived values to. An input
   * carrying one of them keeps the key but may lose its value. Disjoint
   * from `removedFields`.
   */
  readonly rewrittenFields: readonly string[];

  /**
   * Load mappings or config from collaborators. Called once by the
   * dispatcher before the first transform; failures degrade to defaults.
   */
  initialize?(): Promise<void>;

  transform(record: DataRecord, context?: TransformContext): DataRecord;
  /** Identifying fields absent from the input; empty when valid */
  missingInputFields(record: DataRecord): string[];
  validateInput(record: DataRecord): boolean;
  validateOutput(record: DataRecord): boolean;
}

/** Shared construction inputs for transformers */
export interface TransformerDeps {
  fieldMappings: FieldMappingStore;
  configLoader: TransformationConfigLoader;
  logger: Logger;
}

export type TransformerFactory = (deps: TransformerDeps) => EntityTransformer;
