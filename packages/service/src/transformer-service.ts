/**
 * Transformer Service
 *
 * Batch front end over a dispatcher registry. Records are transformed one
 * at a time; a record that fails is reported and the batch carries on.
 */

import type { DataRecord, ErrorCode, JobType, Logger, TransformContext } from '@callbridge/core';
import {
  NotFoundError,
  ValidationError,
  createTraceId,
  getLogger,
  isPlainObject,
  transformRequestSchema,
  wrapError,
} from '@callbridge/core';
import type { DispatcherRegistry, JobTypeRef, PlatformPair } from '@callbridge/transform-core';

export interface BatchFailure {
  /** Position of the record in the input */
  index: number;
  code: ErrorCode;
  message: string;
  missingFields?: string[];
}

export interface BatchResult {
  jobType: JobType;
  traceId: string;
  records: DataRecord[];
  failures: BatchFailure[];
}

export interface PlatformSummary extends PlatformPair {
  jobTypes: JobType[];
}

export class TransformerService {
  private readonly log: Logger;

  constructor(
    private readonly registry: DispatcherRegistry,
    logger?: Logger
  ) {
    this.log = logger ?? getLogger('transformer-service');
  }

  listPlatforms(): PlatformSummary[] {
    return this.registry.getSupportedPlatforms().map((pair) => ({
      ...pair,
      jobTypes: this.registry.getDispatcher(pair.source, pair.target).getSupportedJobTypes(),
    }));
  }

  /** Transform one `{ sourcePlatform, targetPlatform, jobType, data }` request */
  async transformRecord(request: unknown, context?: TransformContext): Promise<DataRecord> {
    const parsed = transformRequestSchema.safeParse(request);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      throw new ValidationError({
        message: `Invalid transform request: ${issues.join('; ')}`,
        suggestion: 'Send sourcePlatform, targetPlatform, jobType and a data object.',
      });
    }

    const { sourcePlatform, targetPlatform, jobType, data } = parsed.data;
    return await this.registry.transformData(sourcePlatform, targetPlatform, jobType, data, context);
  }

  /**
   * Transform every record of a batch. An unknown platform pair or job type
   * fails the whole call; anything else fails only its record.
   */
  async transformBatch(
    source: string,
    target: string,
    jobType: JobTypeRef,
    records: readonly unknown[],
    context: TransformContext = {}
  ): Promise<BatchResult> {
    const dispatcher = this.registry.getDispatcher(source, target);
    const info = dispatcher.getTransformerInfo(jobType);
    if (!info) {
      throw new NotFoundError({
        message: `Unknown job type ${jobType} for ${source} -> ${target}`,
        supported: dispatcher.getSupportedJobTypes().map((j) => j.code),
      });
    }

    const traceId = context.traceId ?? createTraceId();
    const log = this.log.child({ jobTypeCode: info.code, traceId, jobGroupId: context.jobGroupId });
    const result: BatchResult = { jobType: info, traceId, records: [], failures: [] };

    log.info('Batch started', { total: records.length });

    for (const [index, record] of records.entries()) {
      if (!isPlainObject(record)) {
        result.failures.push({ index, code: 'VALIDATION_ERROR', message: 'Record is not a JSON object' });
        continue;
      }
      try {
        result.records.push(await dispatcher.transform(info.code, record, { ...context, traceId }));
      } catch (error) {
        const wrapped = wrapError(error, info.code);
        const failure: BatchFailure = { index, code: wrapped.code, message: wrapped.message };
        if (wrapped instanceof ValidationError && wrapped.missingFields.length > 0) {
          failure.missingFields = wrapped.missingFields;
        }
        result.failures.push(failure);
      }
    }

    const summary = { total: records.length, transformed: result.records.length, failed: result.failures.length };
    if (result.failures.length > 0) {
      log.warn('Batch finished with failures', summary);
    } else {
      log.info('Batch finished', summary);
    }
    return result;
  }
}
