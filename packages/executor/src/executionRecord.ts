/**
 * File-backed execution records: executions/<id>.json under the app directory
 */

import * as path from 'path';
import { packView, unpackView, type View } from '@fn-forms/core';
import { isErrnoException, readJsonFile, writeFileAtomic } from './fsUtils.js';
import {
  executionRecordSchema,
  type EncodedOutput,
  type Execution,
  type ExecutionRecord,
  type ExecutionStatus,
} from './types.js';

export const EXECUTIONS_DIRNAME = 'executions';

const EXECUTION_ID = /^[A-Za-z0-9_-]+$/;

export function executionPath(appDir: string, executionId: string): string {
  if (!EXECUTION_ID.test(executionId)) {
    throw new Error(`Invalid execution id: ${executionId}`);
  }
  return path.join(appDir, EXECUTIONS_DIRNAME, `${executionId}.json`);
}

/**
 * Read a record; null when the execution has not written one yet
 */
export async function readExecutionRecord(appDir: string, executionId: string): Promise<ExecutionRecord | null> {
  try {
    return await readJsonFile(executionPath(appDir, executionId), executionRecordSchema);
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return null;
    throw err;
  }
}

export async function writeExecutionRecord(
  appDir: string,
  executionId: string,
  record: {
    status: ExecutionStatus;
    views: readonly View[];
    output?: EncodedOutput | null;
    logs?: string | null;
  }
): Promise<void> {
  const packed: ExecutionRecord = {
    status: record.status,
    views: record.views.map(packView),
    output: record.output ?? null,
    logs: record.logs ?? null,
  };
  await writeFileAtomic(executionPath(appDir, executionId), JSON.stringify(packed, null, 2));
}

export function toExecution(executionId: string, record: ExecutionRecord): Execution {
  return {
    id: executionId,
    status: record.status,
    views: record.views.map(unpackView),
    output: record.output,
    logs: record.logs,
  };
}
