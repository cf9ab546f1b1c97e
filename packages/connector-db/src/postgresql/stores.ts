import type { Logger } from '@callbridge/core';
import { PostgresClient } from './client.js';
import type { PostgresClientConfig } from './client.js';
import { PostgresTransformationConfigLoader } from './config-loader.js';
import { PostgresFieldMappingStore } from './field-mapping-store.js';

export interface PostgresStoresConfig extends PostgresClientConfig {
  schema?: string;
  logger?: Logger;
}

export interface PostgresStores {
  client: PostgresClient;
  fieldMappings: PostgresFieldMappingStore;
  configLoader: PostgresTransformationConfigLoader;
}

/** One pool shared by the mapping store and the config loader */
export function createPostgresStores(config: PostgresStoresConfig): PostgresStores {
  const { schema, logger, ...clientConfig } = config;
  const client = new PostgresClient(clientConfig);
  return {
    client,
    fieldMappings: new PostgresFieldMappingStore(client, {
      schema,
      logger: logger?.child({ component: 'field-mappings' }),
    }),
    configLoader: new PostgresTransformationConfigLoader(client, {
      schema,
      logger: logger?.child({ component: 'transformation-configs' }),
    }),
  };
}
