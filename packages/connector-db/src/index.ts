/**
 * @callbridge/connector-db
 *
 * PostgreSQL implementations of the field mapping store and the
 * transformation config loader.
 */

export * from './postgresql/index.js';
