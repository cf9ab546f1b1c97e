/**
 * Service configuration
 *
 * A JSON file validated by zod. String values may reference environment
 * variables as `${VAR}` or `${VAR:-default}`.
 */

import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { z } from 'zod';
import { ConfigError, isPlainObject } from '@callbridge/core';

export type EnvExpansionOptions = {
  /**
   * If true, missing env vars leave placeholders unchanged instead of erroring.
   * Default: false (fail-fast).
   */
  allowMissing?: boolean;
  /** Variables to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
};

function expandEnvInString(input: string, options: EnvExpansionOptions = {}): string {
  const env = options.env ?? process.env;
  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    if (options.allowMissing) return match;

    throw new ConfigError(`Missing required environment variable: ${name}`, {
      suggestion: `Export ${name} or give it a default with \${${name}:-value}.`,
    });
  });
}

export function expandEnvVars(value: unknown, options?: EnvExpansionOptions): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v, options));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, options);
    }
    return out;
  }
  return value;
}

const sslSchema = z.union([
  z.boolean(),
  z.object({ rejectUnauthorized: z.boolean().optional() }).strict(),
]);

export const databaseSchema = z
  .object({
    connectionString: z.string().min(1).optional(),
    host: z.string().min(1).optional(),
    port: z.number().int().min(1).max(65535).optional(),
    database: z.string().min(1).optional(),
    user: z.string().min(1).optional(),
    password: z.string().min(1).optional(),
    ssl: sslSchema.optional(),
    max: z.number().int().min(1).max(100).optional(),
    schema: z.string().min(1).optional(),
  })
  .strict()
  .refine((db) => db.connectionString !== undefined || db.host !== undefined, {
    message: 'connectionString or host is required',
    path: ['connectionString'],
  });

export type DatabaseConfig = z.infer<typeof databaseSchema>;

export const configFileSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    logging: z
      .object({
        format: z.enum(['text', 'json']).optional(),
        level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
      })
      .strict()
      .optional(),
    database: databaseSchema.optional(),
    mappings: z
      .object({
        file: z.string().min(1),
      })
      .strict()
      .optional(),
    transformations: z
      .object({
        directory: z.string().min(1),
      })
      .strict()
      .optional(),
  })
  .strict();

export type ServiceConfig = z.infer<typeof configFileSchema>;

export function formatZodError(err: z.ZodError, label = 'Invalid config'): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `${label}:\n${issues}`;
}

/**
 * Validate an already parsed config object. `baseDir` anchors the relative
 * file paths it names.
 */
export function parseConfig(raw: unknown, baseDir: string, options?: EnvExpansionOptions): ServiceConfig {
  const result = configFileSchema.safeParse(expandEnvVars(raw, options));
  if (!result.success) {
    throw new ConfigError(formatZodError(result.error));
  }

  const config = result.data;
  if (config.mappings) {
    config.mappings = { file: resolve(baseDir, config.mappings.file) };
  }
  if (config.transformations) {
    config.transformations = { directory: resolve(baseDir, config.transformations.directory) };
  }
  return config;
}

/**
 * Read, expand and validate a config file. Relative paths inside it are
 * resolved against the file's directory.
 */
export async function loadConfig(configPath: string, options?: EnvExpansionOptions): Promise<ServiceConfig> {
  const absolutePath = resolve(process.cwd(), configPath);

  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${absolutePath}`, {
      cause: error instanceof Error ? error : undefined,
    });
  }

  let parsed: unknown;
  try {
    // UTF-8 BOM breaks JSON.parse
    parsed = JSON.parse(content.replace(/^\uFEFF/, ''));
  } catch (error) {
    throw new ConfigError(`Config file ${absolutePath} is not valid JSON`, {
      cause: error instanceof Error ? error : undefined,
    });
  }

  return parseConfig(parsed, dirname(absolutePath), options);
}
