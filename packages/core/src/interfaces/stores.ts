/**
 * Collaborator contracts
 *
 * The engine reads mapping rows and transformation configs through these;
 * implementations live in connector packages or tests.
 */

import type { FieldMapping, TransformationSettings } from '../types/index.js';

export interface FieldMappingStore {
  getFieldMappings(
    jobTypeId: number,
    sourcePlatform: string,
    targetEntity: string
  ): Promise<FieldMapping[]>;
}

export interface TransformationConfigLoader {
  /** Resolves to `{}` when no config exists for the job type */
  getTransformationConfig(jobTypeCode: string): Promise<TransformationSettings>;
}

/** Store with a fixed set of rows, filtered per request */
export class StaticFieldMappingStore implements FieldMappingStore {
  constructor(private readonly mappings: readonly FieldMapping[] = []) {}

  async getFieldMappings(
    jobTypeId: number,
    sourcePlatform: string,
    targetEntity: string
  ): Promise<FieldMapping[]> {
    return this.mappings.filter(
      (m) =>
        m.jobTypeId === jobTypeId &&
        m.sourcePlatform === sourcePlatform &&
        m.targetEntity === targetEntity
    );
  }
}

/** Loader backed by an in-memory map of job type code to settings */
export class StaticConfigLoader implements TransformationConfigLoader {
  private readonly configs: Map<string, TransformationSettings>;

  constructor(configs: { [jobTypeCode: string]: TransformationSettings } = {}) {
    this.configs = new Map(Object.entries(configs));
  }

  async getTransformationConfig(jobTypeCode: string): Promise<TransformationSettings> {
    return this.configs.get(jobTypeCode) ?? {};
  }
}
