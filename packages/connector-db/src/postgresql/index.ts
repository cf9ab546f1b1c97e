/**
 * PostgreSQL-backed collaborators
 */

export { PostgresClient, quoteIdentifier, validateIdentifier } from './client.js';
export type { PostgresClientConfig, PostgresQueryResult, Row, SelectOptions, WhereClause } from './client.js';

export { PostgresFieldMappingStore, DEFAULT_FIELD_MAPPINGS_TABLE } from './field-mapping-store.js';
export type { PostgresFieldMappingStoreOptions } from './field-mapping-store.js';

export { PostgresTransformationConfigLoader } from './config-loader.js';
export type { PostgresConfigLoaderOptions } from './config-loader.js';

export { createPostgresStores } from './stores.js';
export type { PostgresStores, PostgresStoresConfig } from './stores.js';
