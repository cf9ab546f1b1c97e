/**
 * Wire collaborators, registry and service from a service config
 */

import type { FieldMappingStore, Logger, TransformationConfigLoader } from '@callbridge/core';
import { StaticConfigLoader, StaticFieldMappingStore, rootLogger } from '@callbridge/core';
import { createPostgresStores } from '@callbridge/connector-db';
import type { PostgresStores } from '@callbridge/connector-db';
import { createDefaultRegistry } from '@callbridge/transform-core';
import type { DispatcherRegistry } from '@callbridge/transform-core';
import type { DatabaseConfig, ServiceConfig } from './config.js';
import { JsonFieldMappingStore, YamlDirectoryConfigLoader } from './file-stores.js';
import { TransformerService } from './transformer-service.js';

export interface Runtime {
  registry: DispatcherRegistry;
  service: TransformerService;
  close(): Promise<void>;
}

/**
 * Pool for the database stores. A pool whose first connection fails is
 * ended before the error propagates.
 */
async function connectStores(database: DatabaseConfig, logger: Logger): Promise<PostgresStores> {
  const stores = createPostgresStores({ ...database, logger });
  try {
    await stores.client.connect();
  } catch (error) {
    await stores.client.disconnect().catch((endError: unknown) => {
      logger.warn('Failed to end PostgreSQL pool', {
        error: endError instanceof Error ? endError.message : String(endError),
      });
    });
    throw error;
  }
  logger.info('Connected to PostgreSQL', { schema: database.schema ?? 'public' });
  return stores;
}

/**
 * Files named in the config take precedence over the database; with
 * neither, transformers run on built-in defaults. The database is only
 * connected when it backs at least one of the two.
 */
export async function createRuntime(config: ServiceConfig, logger: Logger = rootLogger): Promise<Runtime> {
  const filesOnly = config.mappings !== undefined && config.transformations !== undefined;
  let stores: PostgresStores | null = null;
  if (config.database && filesOnly) {
    logger.info('Database configured but unused: mappings and transformation configs come from files');
  } else if (config.database) {
    stores = await connectStores(config.database, logger);
  }

  let fieldMappings: FieldMappingStore = stores?.fieldMappings ?? new StaticFieldMappingStore();
  if (config.mappings) {
    fieldMappings = new JsonFieldMappingStore(config.mappings.file, {
      logger: logger.child({ component: 'field-mappings' }),
    });
  }

  let configLoader: TransformationConfigLoader = stores?.configLoader ?? new StaticConfigLoader();
  if (config.transformations) {
    configLoader = new YamlDirectoryConfigLoader(config.transformations.directory, {
      logger: logger.child({ component: 'transformation-configs' }),
    });
  }

  const registry = createDefaultRegistry({ fieldMappings, configLoader, logger });
  const service = new TransformerService(registry, logger.child({ component: 'transformer-service' }));

  return {
    registry,
    service,
    async close() {
      registry.clearCache();
      if (stores) await stores.client.disconnect();
    },
  };
}
