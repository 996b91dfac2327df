/**
 * Execution record store tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { FileUploadView, TextFieldView } from '@fn-forms/core';
import { executionPath, readExecutionRecord, toExecution, writeExecutionRecord } from '../executionRecord.js';

describe('execution records', () => {
  let appDir: string;

  beforeEach(async () => {
    appDir = await fs.mkdtemp(path.join(os.tmpdir(), 'fn-forms-record-test-'));
  });

  afterEach(async () => {
    await fs.rm(appDir, { recursive: true, force: true });
  });

  it('should place records under executions/', () => {
    expect(executionPath(appDir, 'run-1')).toBe(path.join(appDir, 'executions', 'run-1.json'));
  });

  it('should refuse ids that are not plain names', () => {
    expect(() => executionPath(appDir, '../escape')).toThrow('Invalid execution id: ../escape');
  });

  it('should return null before a record exists', async () => {
    expect(await readExecutionRecord(appDir, 'missing')).toBeNull();
  });

  it('should store packed views and read them back', async () => {
    const text: TextFieldView = { type: 'TextFieldView', id: 't', enabled: true, label: null, optional: false, data: '1' };
    const upload: FileUploadView = {
      type: 'FileUploadView',
      id: 'f',
      enabled: true,
      label: 'File',
      optional: true,
      isText: false,
      data: new Uint8Array([104, 105]),
    };

    await writeExecutionRecord(appDir, 'run-1', { status: 'READY', views: [text, upload] });

    const raw: unknown = JSON.parse(await fs.readFile(executionPath(appDir, 'run-1'), 'utf-8'));
    expect(raw).toMatchObject({ status: 'READY', output: null, logs: null });
    expect(raw).toMatchObject({ views: [{ id: 't' }, { id: 'f', data: 'aGk=' }] });

    const record = await readExecutionRecord(appDir, 'run-1');
    expect(record).not.toBeNull();
    if (record) {
      expect(toExecution('run-1', record)).toEqual({
        id: 'run-1',
        status: 'READY',
        views: [text, upload],
        output: null,
        logs: null,
      });
    }
  });

  it('should fill defaults of sparse records', async () => {
    await fs.mkdir(path.join(appDir, 'executions'));
    await fs.writeFile(executionPath(appDir, 'sparse'), JSON.stringify({ status: 'SCHEDULED' }));

    expect(await readExecutionRecord(appDir, 'sparse')).toEqual({ status: 'SCHEDULED', views: [], output: null, logs: null });
  });

  it('should reject records with an unknown status', async () => {
    await fs.mkdir(path.join(appDir, 'executions'));
    await fs.writeFile(executionPath(appDir, 'bad'), JSON.stringify({ status: 'PAUSED' }));

    await expect(readExecutionRecord(appDir, 'bad')).rejects.toThrow(/^Invalid .*bad\.json: status: /);
  });

  it('should leave no temp files behind', async () => {
    await writeExecutionRecord(appDir, 'run-2', { status: 'FAILED', views: [], logs: 'boom' });

    expect(await fs.readdir(path.join(appDir, 'executions'))).toEqual(['run-2.json']);
  });
});
