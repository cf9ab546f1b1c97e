/**
 * Platform Dispatcher
 *
 * Routes job types of one (source, target) platform pair to their entity
 * transformers. Transformers are built on first use and cached by job type
 * code; a numeric job type id resolves to the same cached instance.
 */

import type {
  DataRecord,
  EntityKind,
  EntityTransformer,
  JobType,
  Logger,
  TransformContext,
  TransformerDeps,
  TransformerFactory,
} from '@callbridge/core';
import { NotFoundError, TransformationError, ValidationError, droppedKeys, wrapError } from '@callbridge/core';

/** One row of a dispatcher's registration table */
export interface TransformerRegistration {
  code: string;
  id: number;
  name: string;
  entity: EntityKind;
  create: TransformerFactory;
  dependencies?: string[];
}

export type JobTypeRef = string | number;

export class PlatformDispatcher {
  private readonly byCode = new Map<string, TransformerRegistration>();
  private readonly byId = new Map<number, TransformerRegistration>();
  private readonly instances = new Map<string, Promise<EntityTransformer>>();
  private readonly log: Logger;

  constructor(
    readonly sourcePlatform: string,
    readonly targetPlatform: string,
    registrations: readonly TransformerRegistration[],
    private readonly deps: TransformerDeps
  ) {
    this.log = deps.logger.child({ dispatcher: `${sourcePlatform}->${targetPlatform}` });

    for (const registration of registrations) {
      if (this.byCode.has(registration.code) || this.byId.has(registration.id)) {
        throw new TransformationError({
          message: `Duplicate job type registration '${registration.code}' (${registration.id})`,
          jobTypeCode: registration.code,
          suggestion: 'Job type codes and ids must be unique within one dispatcher.',
        });
      }
      this.byCode.set(registration.code, registration);
      this.byId.set(registration.id, registration);
    }
  }

  getSupportedJobTypes(): JobType[] {
    return Array.from(this.byCode.values()).map((r) => this.describe(r));
  }

  supportsJobType(ref: JobTypeRef): boolean {
    return this.resolve(ref) !== undefined;
  }

  getTransformerInfo(ref: JobTypeRef): JobType | undefined {
    const registration = this.resolve(ref);
    return registration ? this.describe(registration) : undefined;
  }

  /**
   * Cached transformer for a job type code or id. Concurrent first calls
   * share one construction.
   */
  getTransformer(ref: JobTypeRef): Promise<EntityTransformer> {
    const registration = this.resolveOrThrow(ref);
    const cached = this.instances.get(registration.code);
    if (cached) return cached;

    const created = this.create(registration);
    this.instances.set(registration.code, created);
    // A failed construction is not cached; the caller still sees the rejection.
    void created.catch(() => {
      this.instances.delete(registration.code);
    });
    return created;
  }

  /**
   * Validate, transform and validate again. Validation failures surface as
   * ValidationError; anything unexpected is wrapped in TransformationError.
   */
  async transform(ref: JobTypeRef, data: DataRecord, context: TransformContext = {}): Promise<DataRecord> {
    const transformer = await this.getTransformer(ref);
    const code = transformer.jobTypeCode;
    const log = this.log.child({ jobTypeCode: code, traceId: context.traceId, jobGroupId: context.jobGroupId });

    const missing = transformer.missingInputFields(data);
    if (missing.length > 0 || !transformer.validateInput(data)) {
      log.warn('Input failed validation', { missingFields: missing });
      throw new ValidationError({
        message: missing.length > 0
          ? `Input for ${code} is missing required fields: ${missing.join(', ')}`
          : `Input for ${code} failed validation`,
        jobTypeCode: code,
        missingFields: missing,
      });
    }

    log.info('Transforming record', { id: data.id });

    let output: DataRecord;
    try {
      output = transformer.transform(data, context);
    } catch (error) {
      const wrapped = wrapError(error, code);
      log.error('Transformation failed', { error: wrapped.message, code: wrapped.code });
      throw wrapped;
    }

    const dropped = droppedKeys(data, output, transformer.removedFields);
    if (dropped.length > 0) {
      log.warn('Transformer dropped input fields it does not document as removed', { fields: dropped });
    }

    if (!transformer.validateOutput(output)) {
      throw new ValidationError({
        message: `Output of ${code} failed validation`,
        jobTypeCode: code,
        suggestion: 'Check the source record for empty identifying fields.',
      });
    }

    log.info('Record transformed', { id: data.id });
    return output;
  }

  /** Drop cached transformers so the next call reloads mappings and config. */
  clearCache(): void {
    this.instances.clear();
  }

  private async create(registration: TransformerRegistration): Promise<EntityTransformer> {
    const transformer = registration.create(this.deps);
    if (transformer.initialize) {
      try {
        await transformer.initialize();
      } catch (error) {
        throw wrapError(error, registration.code);
      }
    }
    this.log.debug('Transformer ready', { jobTypeCode: registration.code });
    return transformer;
  }

  private resolve(ref: JobTypeRef): TransformerRegistration | undefined {
    if (typeof ref === 'number') return this.byId.get(ref);
    const byCode = this.byCode.get(ref);
    if (byCode) return byCode;
    return /^\d+$/.test(ref) ? this.byId.get(Number.parseInt(ref, 10)) : undefined;
  }

  private resolveOrThrow(ref: JobTypeRef): TransformerRegistration {
    const registration = this.resolve(ref);
    if (!registration) {
      throw new NotFoundError({
        message: `Unsupported job type '${ref}' for ${this.sourcePlatform} -> ${this.targetPlatform}`,
        supported: Array.from(this.byCode.values()).map((r) => `${r.code} (${r.id})`),
      });
    }
    return registration;
  }

  private describe(registration: TransformerRegistration): JobType {
    return {
      id: registration.id,
      code: registration.code,
      name: registration.name,
      sourcePlatform: this.sourcePlatform,
      targetPlatform: this.targetPlatform,
      entity: registration.entity,
      isExtractionOnly: false,
      dependencies: registration.dependencies ?? [],
    };
  }
}
