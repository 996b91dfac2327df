/**
 * AppExecutor - runs a decoded app in a child process
 *
 * Each execution gets its own record file and its own process. The parent
 * only writes the initial record, and a FAILED record when the child dies
 * without reaching a final status.
 */

import { spawn } from 'child_process';
import { randomUUID } from 'crypto';
import * as path from 'path';
import { setTimeout as sleep } from 'timers/promises';
import { formatError, type View } from '@fn-forms/core';
import { resolveExecutorConfig, type AppExecutorOptions, type ExecutorConfig } from './config.js';
import { EXECUTE_SCRIPT } from './runtime.js';
import { readExecutionRecord, toExecution, writeExecutionRecord } from './executionRecord.js';
import { isTerminal, type Execution } from './types.js';

const STDERR_LIMIT = 64 * 1024;

interface ChildExit {
  error: unknown;
  code: number | null;
  signal: NodeJS.Signals | null;
  stderr: string;
}

export interface WaitOptions {
  timeoutMs?: number;
}

export class AppExecutor {
  readonly appDir: string;
  private readonly config: ExecutorConfig;
  private readonly running = new Set<Promise<void>>();

  constructor(appDir: string, options: AppExecutorOptions = {}) {
    this.appDir = path.resolve(appDir);
    this.config = resolveExecutorConfig(options);
  }

  /**
   * Start an execution. A refresh (`apply` false) returns once the child is done;
   * a run returns once the child reports progress or the progress timeout passes.
   */
  async execute(views: readonly View[], apply: boolean): Promise<Execution> {
    const executionId = randomUUID();
    await writeExecutionRecord(this.appDir, executionId, { status: apply ? 'SCHEDULED' : 'READY', views });

    const exited = this.launch(executionId, apply);
    if (apply) {
      await this.waitForProgress(executionId, exited);
    } else {
      await exited;
    }
    return this.poll(executionId);
  }

  async poll(executionId: string): Promise<Execution> {
    const record = await readExecutionRecord(this.appDir, executionId);
    if (!record) {
      return { id: executionId, status: 'SCHEDULED', views: [], output: null, logs: null };
    }
    return toExecution(executionId, record);
  }

  /**
   * Refresh the form: apply `views` and return the recomputed ones
   */
  async views(views: readonly View[] = []): Promise<View[]> {
    const execution = await this.execute(views, false);
    if (execution.status === 'FAILED') {
      throw new Error(`Execution ${execution.id} failed:\n${execution.logs ?? ''}`);
    }
    return execution.views;
  }

  /**
   * Poll until the execution reaches FINISHED or FAILED
   */
  async waitFor(executionId: string, options: WaitOptions = {}): Promise<Execution> {
    const timeoutMs = options.timeoutMs ?? 30_000;
    const deadline = Date.now() + timeoutMs;
    for (;;) {
      const execution = await this.poll(executionId);
      if (isTerminal(execution.status)) return execution;
      if (Date.now() >= deadline) {
        throw new Error(`Execution ${executionId} did not finish within ${timeoutMs}ms`);
      }
      await sleep(this.config.pollIntervalMs);
    }
  }

  /**
   * Resolves once every child started by this executor has exited and been recorded
   */
  async settled(): Promise<void> {
    await Promise.all([...this.running]);
  }

  private launch(executionId: string, apply: boolean): Promise<void> {
    const { nodePath, nodeArgs, env, logger } = this.config;
    const args = [...nodeArgs, EXECUTE_SCRIPT, executionId, String(apply)];
    logger.debug(`Spawning ${nodePath} ${args.join(' ')} in ${this.appDir}`);

    const exit = new Promise<ChildExit>((resolve) => {
      let stderr = '';
      const child = spawn(nodePath, args, {
        cwd: this.appDir,
        env: { ...process.env, ...env },
        stdio: ['ignore', 'pipe', 'pipe'],
      });
      child.stdout.on('data', (chunk: Buffer) => {
        logger.debug(`[${executionId}] ${chunk.toString('utf-8').trimEnd()}`);
      });
      child.stderr.on('data', (chunk: Buffer) => {
        if (stderr.length < STDERR_LIMIT) stderr += chunk.toString('utf-8');
      });
      child.once('error', (error) => resolve({ error, code: null, signal: null, stderr }));
      child.once('close', (code, signal) => resolve({ error: undefined, code, signal, stderr }));
    });

    const task: Promise<void> = exit
      .then((result) => this.recordExit(executionId, apply, result))
      .catch((err: unknown) => {
        logger.error(`Failed to record the exit of execution ${executionId}: ${formatError(err)}`);
      })
      .then(() => {
        this.running.delete(task);
      });
    this.running.add(task);
    return task;
  }

  private async waitForProgress(executionId: string, exited: Promise<void>): Promise<void> {
    const deadline = Date.now() + this.config.progressTimeoutMs;
    for (;;) {
      const record = await readExecutionRecord(this.appDir, executionId);
      if (record && record.status !== 'SCHEDULED') return;
      if (Date.now() >= deadline) return;
      await Promise.race([exited, sleep(this.config.pollIntervalMs)]);
    }
  }

  /**
   * A child that exits without a final status is recorded as FAILED
   */
  private async recordExit(executionId: string, apply: boolean, exit: ChildExit): Promise<void> {
    const record = await readExecutionRecord(this.appDir, executionId);
    const status = record?.status;
    const completed = status !== undefined && (isTerminal(status) || (!apply && status === 'READY'));
    if (exit.error === undefined && exit.code === 0 && completed) return;
    if (status !== undefined && isTerminal(status)) return;

    const logs =
      exit.error !== undefined
        ? formatError(exit.error)
        : exit.stderr.trim() ||
          (exit.signal ? `Runner killed by ${exit.signal}` : `Runner exited with code ${exit.code ?? 'unknown'}`);
    this.config.logger.warn(`Execution ${executionId} failed outside the runner`);
    await writeExecutionRecord(this.appDir, executionId, {
      status: 'FAILED',
      views: record ? toExecution(executionId, record).views : [],
      logs,
    });
  }
}
