/**
 * Execution runner, started by execute.mjs inside the app directory:
 *
 *   node [nodeArgs] execute.mjs <executionId> <true|false>
 *
 * Every failure ends up in the execution record; nothing escapes to the parent.
 */

import { Command, InvalidArgumentError } from 'commander';
import * as fs from 'fs/promises';
import { pathToFileURL } from 'url';
import {
  ConfigurationError,
  formatError,
  formatZodError,
  reviveFunction,
  toCallable,
  unpackController,
  unpackView,
  type Controller,
  type RevivedFunction,
  type View,
} from '@fn-forms/core';
import { encodeOutput } from './encoders.js';
import { readExecutionRecord, writeExecutionRecord } from './executionRecord.js';
import { readJsonFile, resolveWithin } from './fsUtils.js';
import { createLogger, type Logger } from './logger.js';
import { appSettingsSchema, serializedFunctionSchema, type FunctionSettings } from './types.js';

export interface RunExecutionOptions {
  appDir: string;
  executionId: string;
  apply: boolean;
  /** App settings as written into execute.mjs; validated here */
  settings: unknown;
  logger?: Logger;
}

async function importExport(appDir: string, reference: string): Promise<RevivedFunction> {
  const separator = reference.indexOf('#');
  const modulePath = reference.slice(0, separator);
  const exportName = reference.slice(separator + 1);
  const moduleUrl = pathToFileURL(resolveWithin(appDir, modulePath, 'Function module')).href;
  const loaded: unknown = await import(moduleUrl);
  const value: unknown = typeof loaded === 'object' && loaded !== null ? Reflect.get(loaded, exportName) : undefined;
  return toCallable(value, `Export "${exportName}" of ${modulePath}`);
}

async function loadFunction(appDir: string, settings: FunctionSettings): Promise<RevivedFunction> {
  // Bundled modules are referenced as `<bundle>#<export>`, like source mode
  if (settings.type === 'source' || settings.data.includes('#')) {
    return importExport(appDir, settings.data);
  }
  const { name, source } = await readJsonFile(
    resolveWithin(appDir, settings.data, 'Serialized function'),
    serializedFunctionSchema
  );
  return reviveFunction(source, name ?? 'app function');
}

async function readController(appDir: string, fileName: string): Promise<Controller> {
  const content = await fs.readFile(resolveWithin(appDir, fileName, 'Controller file'), 'utf-8');
  const packed: unknown = JSON.parse(content);
  return unpackController(packed);
}

/**
 * Reconcile the recorded views and, when `apply` is set, call the function
 */
export async function runExecution(options: RunExecutionOptions): Promise<void> {
  const { appDir, executionId, apply } = options;
  const logger = options.logger ?? createLogger('runner');
  let views: View[] = [];

  try {
    const parsed = appSettingsSchema.safeParse(options.settings);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid app settings: ${formatZodError(parsed.error)}`);
    }
    const settings = parsed.data;

    const record = await readExecutionRecord(appDir, executionId);
    views = record ? record.views.map(unpackView) : [];

    const controller = await readController(appDir, settings.controller);
    views = controller.list(views);
    await writeExecutionRecord(appDir, executionId, { status: apply ? 'RUNNING' : 'READY', views });
    if (!apply) return;

    const fn = await loadFunction(appDir, settings.function);
    const output: unknown = await controller.apply(fn, views);
    await writeExecutionRecord(appDir, executionId, { status: 'FINISHED', views, output: encodeOutput(output) });
    logger.debug(`Execution ${executionId} finished`);
  } catch (err) {
    logger.debug(`Execution ${executionId} failed: ${err instanceof Error ? err.message : String(err)}`);
    try {
      await writeExecutionRecord(appDir, executionId, { status: 'FAILED', views, logs: formatError(err) });
    } catch (writeErr) {
      logger.error(`Cannot record the failure of execution ${executionId}: ${formatError(writeErr)}`);
      process.exitCode = 1;
    }
  }
}

function parseApplyFlag(value: string): boolean {
  if (value === 'true') return true;
  if (value === 'false') return false;
  throw new InvalidArgumentError('Expected "true" or "false".');
}

/**
 * Entry point of execute.mjs; the app directory is the working directory
 */
export async function main(argv: readonly string[], settings: unknown): Promise<void> {
  const program = new Command();

  program
    .name('execute')
    .argument('<executionId>', 'execution record to work on')
    .argument('<apply>', 'call the function after reconciling the views', parseApplyFlag)
    .action(async (executionId: string, apply: boolean) => {
      await runExecution({ appDir: process.cwd(), executionId, apply, settings });
    });

  await program.parseAsync([...argv]);
}
