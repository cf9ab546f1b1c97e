/**
 * CLI commands
 *
 * Usage:
 *   callbridge list [--config <config.json>]
 *   callbridge transform --source <platform> --target <platform> --job <code|id>
 *                        --input <records.json> [--output <file>] [--config <config.json>]
 */

import { readFile, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { Logger } from '@callbridge/core';
import { TransformError, ValidationError, isPlainObject, rootLogger } from '@callbridge/core';
import { loadConfig } from './config.js';
import type { ServiceConfig } from './config.js';
import { createRuntime } from './runtime.js';
import type { Runtime } from './runtime.js';

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export interface CliOptions {
  io?: CliIo;
  logger?: Logger;
}

/** Exit codes: usage or setup failure, and a batch with failed records */
export const EXIT_ERROR = 1;
export const EXIT_PARTIAL = 2;

const USAGE = [
  'Usage:',
  '  callbridge list [--config <config.json>]',
  '  callbridge transform --source <platform> --target <platform> --job <code|id>',
  '                       --input <records.json> [--output <file>] [--config <config.json>]',
].join('\n');

const defaultIo: CliIo = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
};

function option(args: string[], name: string): string | undefined {
  const index = args.indexOf(name);
  if (index === -1) return undefined;
  const value = args[index + 1];
  return value === undefined || value.startsWith('--') ? undefined : value;
}

/** Numeric job types are ids; anything else is a code */
export function parseJobTypeRef(value: string): string | number {
  return /^\d+$/.test(value) ? Number(value) : value;
}

/**
 * Records from an input file: a JSON array, `{ "records": [...] }`, or one
 * record object.
 */
export function recordsFromJson(parsed: unknown): unknown[] {
  if (Array.isArray(parsed)) return parsed;
  if (isPlainObject(parsed)) {
    return Array.isArray(parsed.records) ? parsed.records : [parsed];
  }
  throw new ValidationError({
    message: 'Input must be a JSON object or an array of objects',
    suggestion: 'Pass one record, an array of records, or { "records": [...] }.',
  });
}

async function readRecords(path: string): Promise<unknown[]> {
  const content = await readFile(resolve(process.cwd(), path), 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(content.replace(/^\uFEFF/, ''));
  } catch (error) {
    throw new ValidationError({
      message: `Input file ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    });
  }
  return recordsFromJson(parsed);
}

function list(runtime: Runtime, io: CliIo): number {
  for (const platform of runtime.service.listPlatforms()) {
    io.stdout(`${platform.source} -> ${platform.target}`);
    for (const jobType of platform.jobTypes) {
      io.stdout(`  ${jobType.code} (${jobType.id}) ${jobType.entity}: ${jobType.name}`);
    }
  }
  return 0;
}

async function transform(runtime: Runtime, args: string[], io: CliIo, logger: Logger): Promise<number> {
  const source = option(args, '--source');
  const target = option(args, '--target');
  const job = option(args, '--job');
  const input = option(args, '--input');
  if (!source || !target || !job || !input) {
    io.stderr('transform requires --source, --target, --job and --input');
    io.stderr(USAGE);
    return EXIT_ERROR;
  }

  const records = await readRecords(input);
  const result = await runtime.service.transformBatch(source, target, parseJobTypeRef(job), records);
  const body = JSON.stringify(
    { jobType: result.jobType.code, records: result.records, failures: result.failures },
    null,
    2
  );

  const output = option(args, '--output');
  if (output) {
    await writeFile(resolve(process.cwd(), output), `${body}\n`, 'utf-8');
    logger.info('Wrote transformed records', { file: output, count: result.records.length });
  } else {
    io.stdout(body);
  }

  for (const failure of result.failures) {
    io.stderr(`record ${failure.index}: [${failure.code}] ${failure.message}`);
  }
  return result.failures.length > 0 ? EXIT_PARTIAL : 0;
}

export async function runCli(argv: string[], options: CliOptions = {}): Promise<number> {
  const io = options.io ?? defaultIo;
  const logger = options.logger ?? rootLogger;
  const [command, ...args] = argv;

  if (command !== 'list' && command !== 'transform') {
    io.stderr(USAGE);
    return EXIT_ERROR;
  }

  let runtime: Runtime | null = null;
  try {
    const configPath = option(args, '--config');
    const config: ServiceConfig = configPath ? await loadConfig(configPath) : {};
    if (config.logging) logger.configure(config.logging);

    runtime = await createRuntime(config, logger);
    return command === 'list' ? list(runtime, io) : await transform(runtime, args, io, logger);
  } catch (error) {
    io.stderr(
      error instanceof TransformError
        ? error.toActionableMessage()
        : `Error: ${error instanceof Error ? error.message : String(error)}`
    );
    return EXIT_ERROR;
  } finally {
    if (runtime) await runtime.close();
  }
}
