import { describe, expect, it } from 'vitest';
import {
  ConfigError,
  NotFoundError,
  StoreUnavailableError,
  TransformationError,
  TransformError,
  ValidationError,
  wrapError,
} from '../src/errors/index.js';

describe('error types', () => {
  it('lists supported combinations on NotFoundError', () => {
    const err = new NotFoundError({
      message: "No dispatcher for 'teams -> zoom'",
      supported: ['ringcentral -> zoom', 'ssot -> zoom'],
    });

    expect(err).toBeInstanceOf(TransformError);
    expect(err.code).toBe('NOT_FOUND');
    expect(err.toActionableMessage()).toBe(
      "Error [NOT_FOUND]: No dispatcher for 'teams -> zoom'\n" +
        'Suggested action: Supported: ringcentral -> zoom, ssot -> zoom'
    );
  });

  it('carries missing fields on ValidationError', () => {
    const err = new ValidationError({
      message: 'Input validation failed',
      jobTypeCode: 'rc_zoom_users',
      missingFields: ['contact.email'],
    });

    expect(err.toJSON()).toMatchObject({
      name: 'ValidationError',
      code: 'VALIDATION_ERROR',
      jobTypeCode: 'rc_zoom_users',
      missingFields: ['contact.email'],
    });
  });

  it('wraps unknown errors with job context and cause', () => {
    const cause = new TypeError('boom');
    const wrapped = wrapError(cause, 'rc_zoom_ivr');

    expect(wrapped).toBeInstanceOf(TransformationError);
    expect(wrapped.message).toBe('Transformation failed for rc_zoom_ivr: boom');
    expect(wrapped.jobTypeCode).toBe('rc_zoom_ivr');
    expect(wrapped.cause).toBe(cause);
  });

  it('returns engine errors unchanged', () => {
    const err = new ValidationError({ message: 'bad' });
    expect(wrapError(err, 'rc_zoom_ivr')).toBe(err);
  });

  it('wraps non-Error throwables', () => {
    const wrapped = wrapError('plain string');
    expect(wrapped.message).toBe('plain string');
    expect(wrapped.cause).toBeUndefined();
  });

  it('codes store and configuration failures', () => {
    const store = new StoreUnavailableError({
      message: 'Field mapping query failed',
      suggestion: 'Check the database connection settings.',
    });
    const config = new ConfigError('Missing required environment variable: DB_URL');

    expect(store.code).toBe('STORE_UNAVAILABLE');
    expect(store.name).toBe('StoreUnavailableError');
    expect(config.code).toBe('CONFIGURATION_ERROR');
    expect(config.toActionableMessage()).toBe(
      'Error [CONFIGURATION_ERROR]: Missing required environment variable: DB_URL'
    );
  });
});
