/**
 * Transformation configs read from `transformation_configs`, joined to
 * `job_types` by code
 */

import type { Logger, TransformationConfigLoader, TransformationSettings } from '@callbridge/core';
import { getLogger, isPlainObject } from '@callbridge/core';
import { parseTransformationConfig } from '@callbridge/transform-core';
import { quoteIdentifier } from './client.js';
import type { PostgresClient } from './client.js';

export interface PostgresConfigLoaderOptions {
  schema?: string;
  configsTable?: string;
  jobTypesTable?: string;
  logger?: Logger;
}

export class PostgresTransformationConfigLoader implements TransformationConfigLoader {
  private readonly sql: string;
  private readonly log: Logger;

  constructor(
    private readonly client: PostgresClient,
    options: PostgresConfigLoaderOptions = {}
  ) {
    const schema = quoteIdentifier(options.schema ?? 'public', 'schema');
    const configs = quoteIdentifier(options.configsTable ?? 'transformation_configs', 'table');
    const jobTypes = quoteIdentifier(options.jobTypesTable ?? 'job_types', 'table');

    this.sql =
      `SELECT tc."transformation_config" FROM ${schema}.${configs} tc ` +
      `JOIN ${schema}.${jobTypes} jt ON jt."id" = tc."job_type_id" ` +
      `WHERE jt."code" = $1 LIMIT 1`;
    this.log = options.logger ?? getLogger('connector-db.transformation-configs');
  }

  /**
   * YAML text (or a JSON column already decoded by the driver) for the job
   * type; `{}` when no row exists.
   */
  async getTransformationConfig(jobTypeCode: string): Promise<TransformationSettings> {
    const result = await this.client.query(this.sql, [jobTypeCode]);
    const value = result.rows[0]?.transformation_config;

    if (value === undefined || value === null) {
      this.log.debug('No transformation config', { jobTypeCode });
      return {};
    }
    if (isPlainObject(value)) return value;
    if (typeof value === 'string') return parseTransformationConfig(value, `transformation_configs:${jobTypeCode}`);

    this.log.warn('Unexpected transformation config column type, using defaults', {
      jobTypeCode,
      type: typeof value,
    });
    return {};
  }
}
