/**
 * File-backed collaborators for running without a database
 *
 * Field mappings come from one JSON array of mapping rows; transformation
 * configs from `<job_type_code>.yaml` files in a directory.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { FieldMapping, FieldMappingStore, Logger, TransformationConfigLoader, TransformationSettings } from '@callbridge/core';
import { StoreUnavailableError, fieldMappingRowSchema, findDuplicateTargetFields, getLogger } from '@callbridge/core';
import { parseTransformationConfig } from '@callbridge/transform-core';

const JOB_TYPE_CODE = /^[A-Za-z0-9_-]+$/;

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function message(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class JsonFieldMappingStore implements FieldMappingStore {
  private rows: Promise<FieldMapping[]> | null = null;
  private readonly log: Logger;

  constructor(
    private readonly filePath: string,
    options: { logger?: Logger } = {}
  ) {
    this.log = options.logger ?? getLogger('service.field-mappings');
  }

  async getFieldMappings(jobTypeId: number, sourcePlatform: string, targetEntity: string): Promise<FieldMapping[]> {
    const platform = sourcePlatform.toLowerCase();
    const rows = await this.load();
    return rows.filter(
      (m) => m.jobTypeId === jobTypeId && m.sourcePlatform === platform && m.targetEntity === targetEntity
    );
  }

  /** The file is read once; a failed read is retried on the next call. */
  private load(): Promise<FieldMapping[]> {
    if (!this.rows) {
      const loading = this.read();
      this.rows = loading;
      void loading.catch(() => {
        this.rows = null;
      });
    }
    return this.rows;
  }

  private async read(): Promise<FieldMapping[]> {
    let parsed: unknown;
    try {
      const content = await readFile(this.filePath, 'utf-8');
      parsed = JSON.parse(content.replace(/^\uFEFF/, ''));
    } catch (error) {
      throw new StoreUnavailableError({
        message: `Cannot load field mappings from ${this.filePath}: ${message(error)}`,
        cause: error instanceof Error ? error : undefined,
      });
    }

    if (!Array.isArray(parsed)) {
      throw new StoreUnavailableError({
        message: `Field mappings file ${this.filePath} must hold a JSON array`,
        suggestion: 'Write one object per mapping row with job_type_id, source_platform, target_entity, source_field and target_field.',
      });
    }

    const mappings: FieldMapping[] = [];
    parsed.forEach((row, index) => {
      const result = fieldMappingRowSchema.safeParse(row);
      if (!result.success) {
        this.log.warn('Skipping malformed field mapping row', {
          index,
          issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        });
        return;
      }
      mappings.push(result.data);
    });

    const duplicates = findDuplicateTargetFields(mappings);
    if (duplicates.length > 0) {
      this.log.warn('Target fields mapped more than once; the first row wins', { targetFields: duplicates });
    }

    this.log.debug('Loaded field mappings', { file: this.filePath, count: mappings.length });
    return mappings;
  }
}

export class YamlDirectoryConfigLoader implements TransformationConfigLoader {
  private readonly log: Logger;

  constructor(
    private readonly directory: string,
    options: { logger?: Logger } = {}
  ) {
    this.log = options.logger ?? getLogger('service.transformation-configs');
  }

  /**
   * Settings from `<code>.yaml` (or `.yml`); `{}` when neither file exists.
   */
  async getTransformationConfig(jobTypeCode: string): Promise<TransformationSettings> {
    if (!JOB_TYPE_CODE.test(jobTypeCode)) {
      throw new StoreUnavailableError({
        message: `Invalid job type code for a config file name: "${jobTypeCode}"`,
        jobTypeCode,
      });
    }

    for (const extension of ['.yaml', '.yml']) {
      const filePath = join(this.directory, `${jobTypeCode}${extension}`);
      let content: string;
      try {
        content = await readFile(filePath, 'utf-8');
      } catch (error) {
        if (isMissingFile(error)) continue;
        throw new StoreUnavailableError({
          message: `Cannot read transformation config ${filePath}: ${message(error)}`,
          jobTypeCode,
          cause: error instanceof Error ? error : undefined,
        });
      }
      return parseTransformationConfig(content, filePath);
    }

    this.log.debug('No transformation config file', { jobTypeCode, directory: this.directory });
    return {};
  }
}
