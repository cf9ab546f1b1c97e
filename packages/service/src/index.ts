/**
 * @callbridge/service
 *
 * Configuration, file-backed collaborators, the batch transformer service
 * and the CLI commands.
 */

export { ConfigError } from '@callbridge/core';
export { configFileSchema, databaseSchema, expandEnvVars, formatZodError, loadConfig, parseConfig } from './config.js';
export type { DatabaseConfig, EnvExpansionOptions, ServiceConfig } from './config.js';
export { JsonFieldMappingStore, YamlDirectoryConfigLoader } from './file-stores.js';
export { TransformerService } from './transformer-service.js';
export type { BatchFailure, BatchResult, PlatformSummary } from './transformer-service.js';
export { createRuntime } from './runtime.js';
export type { Runtime } from './runtime.js';
export { EXIT_ERROR, EXIT_PARTIAL, parseJobTypeRef, recordsFromJson, runCli } from './commands.js';
export type { CliIo, CliOptions } from './commands.js';
