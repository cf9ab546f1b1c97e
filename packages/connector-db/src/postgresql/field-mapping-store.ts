/**
 * Field mappings read from the `ssot_field_mappings` table
 */

import type { FieldMapping, FieldMappingStore, Logger } from '@callbridge/core';
import { fieldMappingRowSchema, findDuplicateTargetFields, getLogger } from '@callbridge/core';
import type { PostgresClient } from './client.js';

export interface PostgresFieldMappingStoreOptions {
  schema?: string;
  table?: string;
  logger?: Logger;
}

export const DEFAULT_FIELD_MAPPINGS_TABLE = 'ssot_field_mappings';

export class PostgresFieldMappingStore implements FieldMappingStore {
  private readonly schema: string;
  private readonly table: string;
  private readonly log: Logger;

  constructor(
    private readonly client: PostgresClient,
    options: PostgresFieldMappingStoreOptions = {}
  ) {
    this.schema = options.schema ?? 'public';
    this.table = options.table ?? DEFAULT_FIELD_MAPPINGS_TABLE;
    this.log = options.logger ?? getLogger('connector-db.field-mappings');
  }

  /**
   * Rows for one (job type, source platform, entity) group, in id order.
   * Rows that do not parse are skipped with a warning.
   */
  async getFieldMappings(
    jobTypeId: number,
    sourcePlatform: string,
    targetEntity: string
  ): Promise<FieldMapping[]> {
    const rows = await this.client.select(this.table, {
      schema: this.schema,
      where: [
        { column: 'job_type_id', value: jobTypeId },
        { column: 'source_platform', value: sourcePlatform.toLowerCase() },
        { column: 'target_entity', value: targetEntity },
      ],
      orderBy: [{ column: 'id', direction: 'asc' }],
    });

    const mappings: FieldMapping[] = [];
    for (const row of rows) {
      const parsed = fieldMappingRowSchema.safeParse(row);
      if (!parsed.success) {
        this.log.warn('Skipping malformed field mapping row', {
          id: row.id,
          issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        });
        continue;
      }
      mappings.push(parsed.data);
    }

    const duplicates = findDuplicateTargetFields(mappings);
    if (duplicates.length > 0) {
      this.log.warn('Target fields mapped more than once; the first row wins', {
        jobTypeId,
        targetEntity,
        targetFields: duplicates,
      });
    }

    this.log.debug('Loaded field mappings', { jobTypeId, sourcePlatform, targetEntity, count: mappings.length });
    return mappings;
  }
}
