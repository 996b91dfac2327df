/**
 * AppEncoder tests: archive contents, function settings and the packed controller
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { fileURLToPath, pathToFileURL } from 'url';
import { ConfigurationError, TextField, toCallable, unpackController, type Controller } from '@fn-forms/core';
import { defineApp, optional } from '../app.js';
import { extractArchive } from '../archive.js';
import { AppEncoder } from '../encoder.js';
import { silentLogger } from '../logger.js';
import type { ArchiveFormat, FrameData } from '../types.js';
import { total } from './fixtures/project/apps/sum.js';

const PROJECT_ROOT = fileURLToPath(new URL('./fixtures/project', import.meta.url));
const SUM_MODULE = new URL('./fixtures/project/apps/sum.ts', import.meta.url).href;

async function listFiles(root: string, dir = ''): Promise<string[]> {
  const entries = await fs.readdir(path.join(root, dir), { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    const relative = dir ? `${dir}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      files.push(...(await listFiles(root, relative)));
    } else {
      files.push(relative);
    }
  }
  return files.sort();
}

describe('AppEncoder', () => {
  let tempDir: string;
  let outDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'fn-forms-encoder-test-'));
    outDir = path.join(tempDir, 'out');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  function encoder(options: { forceSerialization?: boolean; archive?: ArchiveFormat; strict?: boolean } = {}) {
    return new AppEncoder({ ...options, tempDir, projectRoot: PROJECT_ROOT, logger: silentLogger });
  }

  async function unpack(frame: FrameData): Promise<string[]> {
    const archivePath = path.join(tempDir, 'app.archive');
    await fs.writeFile(archivePath, frame.content);
    await extractArchive(archivePath, outDir, frame.settings.archive);
    return listFiles(outDir);
  }

  async function readController(): Promise<Controller> {
    return unpackController(JSON.parse(await fs.readFile(path.join(outDir, 'controller.json'), 'utf-8')));
  }

  function sumApp() {
    return defineApp({
      fn: total,
      params: [
        { name: 'a', control: new TextField({ id: 'a', data: '1' }) },
        { name: 'b', control: new TextField({ id: 'b', data: '2' }) },
      ],
      source: { module: SUM_MODULE, export: 'total' },
      depends: { modules: ['lib'] },
    });
  }

  it('should reference the function by module and export', async () => {
    const frame = await encoder().encode(sumApp(), { description: 'Sum', params: { owner: 'tests' } });

    expect(frame.mediaType).toEqual({ contentType: 'application/octet-stream', application: 'application/x-fn-forms' });
    expect(frame.description).toBe('Sum');
    expect(frame.params).toEqual({ owner: 'tests' });
    expect(frame.settings).toEqual({
      archive: 'tar.gz',
      function: { type: 'source', data: 'apps/sum.ts#total' },
      controller: 'controller.json',
      parameters: ['a', 'b'],
    });
    expect(await unpack(frame)).toEqual([
      'apps/sum.ts',
      'controller.json',
      'lib/format.ts',
      'lib/scale.ts',
      'package.json',
    ]);
  });

  it('should bundle the function when forced, leaving a placeholder module', async () => {
    const frame = await encoder({ forceSerialization: true }).encode(sumApp());

    expect(frame.settings.function).toEqual({ type: 'serialized', data: 'function.mjs#total' });
    expect(await unpack(frame)).toEqual([
      'apps/sum.ts',
      'controller.json',
      'function.mjs',
      'lib/format.ts',
      'lib/scale.ts',
      'package.json',
    ]);
    expect(await fs.readFile(path.join(outDir, 'apps/sum.ts'), 'utf-8')).toBe('export {};\n');
  });

  it('should bundle module scope into the serialized function', async () => {
    const frame = await encoder().encode(sumApp(), { caller: SUM_MODULE });
    await unpack(frame);

    const bundle: unknown = await import(pathToFileURL(path.join(outDir, 'function.mjs')).href);
    const exported: unknown = typeof bundle === 'object' && bundle !== null ? Reflect.get(bundle, 'total') : undefined;
    const bundled = toCallable(exported, 'total');

    expect(frame.settings.function).toEqual({ type: 'serialized', data: 'function.mjs#total' });
    expect(bundled(1, 2)).toBe(30);
  });

  it('should serialize functions without a source', async () => {
    const multiply = (a: number, b: number) => a * b;
    const app = defineApp({
      fn: multiply,
      params: [
        { name: 'a', control: new TextField({ id: 'a' }) },
        { name: 'b', control: new TextField({ id: 'b' }) },
      ],
    });

    const frame = await encoder({ archive: 'tar' }).encode(app);

    expect(frame.settings.archive).toBe('tar');
    expect(await unpack(frame)).toEqual(['controller.json', 'function.json', 'package.json']);
    expect(JSON.parse(await fs.readFile(path.join(outDir, 'function.json'), 'utf-8'))).toMatchObject({
      name: 'multiply',
    });
  });

  it('should pack reconciled optionality without touching the caller controls', async () => {
    const field = new TextField({ id: 'note' });
    const app = defineApp({
      fn: (note: string | null) => note,
      params: [{ name: 'note', control: field, type: optional('string') }],
    });

    await unpack(await encoder().encode(app));

    expect(field.optional).toBeNull();
    expect((await readController()).get('note')?.optional).toBe(true);
  });

  it('should register unbound parents without passing them to the function', async () => {
    const base = new TextField({ id: 'base', data: '2' });
    const derived = new TextField({
      id: 'derived',
      depends: base,
      update: (control, [parent]) => {
        control.data = String(Number(parent.value()) * 3);
      },
    });
    const app = defineApp({
      fn: (value: string) => value,
      params: [{ name: 'value', control: derived }],
    });

    await unpack(await encoder().encode(app));
    const controller = await readController();

    expect(controller.parameters).toEqual(['derived']);
    expect(controller.controls().map((control) => control.id).slice(0, 2)).toEqual(['derived', 'base']);
    expect(controller.apply((value: string) => value)).toBe('6');
  });

  it('should register bound controls in binding order', async () => {
    const base = new TextField({ id: 'base', data: '2' });
    const derived = new TextField({
      id: 'derived',
      depends: base,
      update: (control, [parent]) => {
        control.data = `${String(parent.value())}!`;
      },
    });
    const app = defineApp({
      fn: (first: string, second: string) => `${first} ${second}`,
      params: [
        { name: 'first', control: derived },
        { name: 'second', control: base },
      ],
    });

    await unpack(await encoder().encode(app));
    const controller = await readController();

    expect(controller.list().map((view) => view.type === 'ApplyView' ? 'apply' : view.id)).toEqual([
      'derived',
      'base',
      'apply',
    ]);
    expect(controller.apply((first: string, second: string) => `${first} ${second}`)).toBe('2! 2');
  });

  it('should refuse unbound parameters before staging anything', async () => {
    const app = {
      fn: (a: number, b: number) => a + b,
      params: [{ name: 'a', control: new TextField({ id: 'a' }) }],
      source: null,
      depends: {},
    };

    await expect(encoder().encode(app)).rejects.toThrow(ConfigurationError);
    expect(await fs.readdir(tempDir)).toEqual([]);
  });

  it('should fail when the function module is missing from the project', async () => {
    const app = defineApp({
      fn: total,
      params: [
        { name: 'a', control: new TextField({ id: 'a' }) },
        { name: 'b', control: new TextField({ id: 'b' }) },
      ],
      source: { module: path.join(PROJECT_ROOT, 'apps/gone.ts'), export: 'total' },
    });

    await expect(encoder().encode(app)).rejects.toThrow('not found');
    expect(await fs.readdir(tempDir)).toEqual([]);
  });
});
