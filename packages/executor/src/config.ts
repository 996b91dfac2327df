/**
 * Encoder, decoder and executor options
 */

import * as os from 'os';
import { z } from 'zod';
import { ConfigurationError, formatZodError, type InvalidationPolicy } from '@fn-forms/core';
import { createLogger, type Logger } from './logger.js';
import { defaultNodeArgs } from './runtime.js';
import { ARCHIVE_FORMATS, type ArchiveFormat } from './types.js';

/** Overrides the default temp directory */
export const TEMP_DIR_ENV = 'FN_FORMS_TEMP_DIR';

function defaultTempDir(): string {
  return process.env[TEMP_DIR_ENV] || os.tmpdir();
}

const encoderSchema = z.object({
  tempDir: z.string().min(1).optional(),
  archive: z.enum(ARCHIVE_FORMATS).default('tar.gz'),
  forceSerialization: z.boolean().default(false),
  strict: z.boolean().default(true),
  projectRoot: z.string().min(1).optional(),
  invalidation: z.enum(['self', 'transitive']).default('self'),
});

const executorSchema = z.object({
  nodePath: z.string().min(1).optional(),
  nodeArgs: z.array(z.string()).optional(),
  progressTimeoutMs: z.number().int().nonnegative().default(2000),
  pollIntervalMs: z.number().int().positive().default(50),
  env: z.record(z.string(), z.string()).default({}),
});

const decoderSchema = executorSchema.extend({
  appDir: z.string().min(1).optional(),
  tempDir: z.string().min(1).optional(),
});

export interface AppEncoderOptions {
  /** Where staging directories and archives are created */
  tempDir?: string;
  archive?: ArchiveFormat;
  /** Capture the function by source even when it has a module */
  forceSerialization?: boolean;
  /** Fail on any optionality disagreement between parameter and control */
  strict?: boolean;
  /** Root of the project modules are staged from; default: nearest package.json above the cwd */
  projectRoot?: string;
  invalidation?: InvalidationPolicy;
  logger?: Logger;
}

export interface AppExecutorOptions {
  nodePath?: string;
  /** Extra node flags placed before the execution script */
  nodeArgs?: string[];
  /** How long execute(views, true) waits for the run to leave SCHEDULED */
  progressTimeoutMs?: number;
  pollIntervalMs?: number;
  /** Added to the child environment */
  env?: Record<string, string>;
  logger?: Logger;
}

export interface AppDecoderOptions extends AppExecutorOptions {
  /** Extraction target, replaced if it exists; default: a fresh directory under tempDir */
  appDir?: string;
  tempDir?: string;
}

export interface EncoderConfig {
  tempDir: string;
  archive: ArchiveFormat;
  forceSerialization: boolean;
  strict: boolean;
  projectRoot: string | null;
  invalidation: InvalidationPolicy;
  logger: Logger;
}

export interface ExecutorConfig {
  nodePath: string;
  nodeArgs: string[];
  progressTimeoutMs: number;
  pollIntervalMs: number;
  env: Record<string, string>;
  logger: Logger;
}

export interface DecoderConfig {
  appDir: string | null;
  tempDir: string;
  executor: AppExecutorOptions;
  logger: Logger;
}

function parse<S extends z.ZodType>(schema: S, options: unknown, what: string): z.output<S> {
  const parsed = schema.safeParse(options);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid ${what} options: ${formatZodError(parsed.error)}`);
  }
  return parsed.data;
}

export function resolveEncoderConfig(options: AppEncoderOptions = {}): EncoderConfig {
  const { logger, ...rest } = options;
  const parsed = parse(encoderSchema, rest, 'encoder');
  return {
    ...parsed,
    tempDir: parsed.tempDir ?? defaultTempDir(),
    projectRoot: parsed.projectRoot ?? null,
    logger: logger ?? createLogger('encoder'),
  };
}

export function resolveExecutorConfig(options: AppExecutorOptions = {}): ExecutorConfig {
  const { logger, ...rest } = options;
  const parsed = parse(executorSchema, rest, 'executor');
  return {
    ...parsed,
    nodePath: parsed.nodePath ?? process.execPath,
    nodeArgs: parsed.nodeArgs ?? defaultNodeArgs(),
    logger: logger ?? createLogger('executor'),
  };
}

export function resolveDecoderConfig(options: AppDecoderOptions = {}): DecoderConfig {
  const { logger, appDir, tempDir, ...executor } = options;
  const parsed = parse(decoderSchema, { ...executor, appDir, tempDir }, 'decoder');
  return {
    appDir: parsed.appDir ?? null,
    tempDir: parsed.tempDir ?? defaultTempDir(),
    executor: logger ? { ...executor, logger } : executor,
    logger: logger ?? createLogger('decoder'),
  };
}
