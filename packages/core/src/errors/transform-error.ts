/**
 * Error types for the transformation engine
 *
 * Every error carries a code for programmatic handling and, where one
 * exists, a suggested action for the operator reading the log.
 */

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'TRANSFORMATION_FAILED'
  | 'CONFIGURATION_ERROR'
  | 'STORE_UNAVAILABLE';

export interface TransformErrorDetails {
  /** Error code for programmatic handling */
  code: ErrorCode;
  /** Human-readable message */
  message: string;
  /** Job type code being processed, when known */
  jobTypeCode?: string;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: Error;
  /** Additional context */
  context?: Record<string, unknown>;
}

export class TransformError extends Error {
  readonly code: ErrorCode;
  readonly jobTypeCode?: string;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: TransformErrorDetails) {
    super(details.message);
    this.name = 'TransformError';
    this.code = details.code;
    this.jobTypeCode = details.jobTypeCode;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }

    Error.captureStackTrace(this, new.target);
  }

  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];

    if (this.jobTypeCode) {
      parts.push(`Job type: ${this.jobTypeCode}`);
    }

    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }

    return parts.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      jobTypeCode: this.jobTypeCode,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

/**
 * Input or output failed its entity contract. The record is aborted.
 */
export class ValidationError extends TransformError {
  readonly missingFields: string[];

  constructor(details: Omit<TransformErrorDetails, 'code'> & { missingFields?: string[] }) {
    super({ ...details, code: 'VALIDATION_ERROR' });
    this.name = 'ValidationError';
    this.missingFields = details.missingFields ?? [];
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), missingFields: this.missingFields };
  }
}

/**
 * No dispatcher for a platform pair, or no transformer for a job type.
 * `supported` lists what is registered.
 */
export class NotFoundError extends TransformError {
  readonly supported: string[];

  constructor(details: Omit<TransformErrorDetails, 'code'> & { supported: string[] }) {
    super({
      ...details,
      code: 'NOT_FOUND',
      suggestion: details.suggestion ?? `Supported: ${details.supported.join(', ') || 'none'}`,
    });
    this.name = 'NotFoundError';
    this.supported = details.supported;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), supported: this.supported };
  }
}

/**
 * Unexpected failure while applying mappings or rules.
 */
export class TransformationError extends TransformError {
  constructor(details: Omit<TransformErrorDetails, 'code'>) {
    super({ ...details, code: 'TRANSFORMATION_FAILED' });
    this.name = 'TransformationError';
  }
}

/**
 * A mapping store or config loader could not be reached. Transformers
 * degrade to defaults; direct callers see this error.
 */
export class StoreUnavailableError extends TransformError {
  constructor(details: Omit<TransformErrorDetails, 'code'>) {
    super({ ...details, code: 'STORE_UNAVAILABLE' });
    this.name = 'StoreUnavailableError';
  }
}

/**
 * Service configuration is missing, unreadable or invalid.
 */
export class ConfigError extends TransformError {
  constructor(message: string, details: Omit<TransformErrorDetails, 'code' | 'message'> = {}) {
    super({ ...details, message, code: 'CONFIGURATION_ERROR' });
    this.name = 'ConfigError';
  }
}

/**
 * Return known engine errors unchanged; wrap anything else in a
 * TransformationError that keeps the original as `cause`.
 */
export function wrapError(error: unknown, jobTypeCode?: string): TransformError {
  if (error instanceof TransformError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new TransformationError({
    message: jobTypeCode ? `Transformation failed for ${jobTypeCode}: ${message}` : message,
    jobTypeCode,
    cause,
  });
}
