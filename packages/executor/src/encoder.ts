/**
 * AppEncoder - packages a bound function, its control graph and its
 * dependencies into one archive
 *
 * Archive layout:
 *   <project-relative sources>     staged dependencies
 *   tarballs/                      prebuilt packages
 *   package.json                   accumulated npm dependencies
 *   controller.json                packed control graph
 *   function.mjs                   bundled function module (serialized mode, function with a source)
 *   function.json                  function source text (serialized mode, function without a source)
 */

import { randomUUID } from 'crypto';
import * as fs from 'fs/promises';
import * as path from 'path';
import { build } from 'esbuild';
import {
  Controller,
  ConfigurationError,
  packController,
  serializeFunction,
  unpackControl,
  type Control,
} from '@fn-forms/core';
import { resolveBindings, type App, type ResolvedBinding } from './app.js';
import { archiveExtension, createArchive } from './archive.js';
import { resolveEncoderConfig, type AppEncoderOptions, type EncoderConfig } from './config.js';
import {
  ModuleDependency,
  PackageDependency,
  ProjectDependency,
  RequirementsDependency,
  TarballDependency,
  stageDependencies,
  type Dependency,
} from './dependencies.js';
import { findProjectRoot, isInside, pathExists, removeDir, toFilePath, toPosixRelative, writeJsonFile } from './fsUtils.js';
import type { FrameData, FunctionSettings, SerializedFunction } from './types.js';

export const CONTROLLER_FILENAME = 'controller.json';
export const FUNCTION_FILENAME = 'function.json';
export const BUNDLE_FILENAME = 'function.mjs';
export const APP_MEDIA_TYPE = 'application/x-fn-forms';

const PLACEHOLDER_MODULE = 'export {};\n';

export interface EncodeOptions {
  description?: string;
  params?: Record<string, unknown>;
  /** Module calling encode (usually import.meta.url); the function is serialized when it is the function's own module */
  caller?: string;
}

/**
 * Copy the bound controls in binding order, then every unbound ancestor
 * they reach. The caller's controls are neither mutated nor re-attached.
 */
function copyControls(bindings: readonly ResolvedBinding[]): Control[] {
  const optional = new Map(bindings.map((binding) => [binding.control.id, binding.optional]));
  const ordered: Control[] = [];
  const visited = new Set<string>();

  const add = (control: Control): void => {
    if (visited.has(control.id)) return;
    visited.add(control.id);
    ordered.push(control);
  };
  for (const binding of bindings) add(binding.control);
  for (let i = 0; i < ordered.length; i++) {
    for (const parent of ordered[i].parentControls) add(parent);
  }

  return ordered.map((control) => {
    const copy = unpackControl(control.pack());
    const reconciled = optional.get(control.id);
    if (reconciled !== undefined) copy.optional = reconciled;
    return copy;
  });
}

export class AppEncoder {
  private readonly config: EncoderConfig;

  constructor(options: AppEncoderOptions = {}) {
    this.config = resolveEncoderConfig(options);
  }

  async encode(app: App, options: EncodeOptions = {}): Promise<FrameData> {
    const { logger } = this.config;
    const bindings = resolveBindings(app, { strict: this.config.strict });
    const controller = new Controller(copyControls(bindings), {
      invalidation: this.config.invalidation,
      parameters: bindings.map((binding) => binding.control.id),
    });
    const projectRoot = path.resolve(this.config.projectRoot ?? (await findProjectRoot(process.cwd())));
    const serialize = this.mustSerialize(app, options.caller);

    await fs.mkdir(this.config.tempDir, { recursive: true });
    const stageDir = await fs.mkdtemp(path.join(this.config.tempDir, 'fn-forms-stage-'));
    const archivePath = path.join(this.config.tempDir, `fn-forms-${randomUUID()}${archiveExtension(this.config.archive)}`);

    try {
      const functionModule = app.source ? toFilePath(app.source.module) : null;
      const source = serialize ? null : app.source;
      const dependencies = this.collectDependencies(app, projectRoot, serialize ? functionModule : null);
      let functionSettings: FunctionSettings;

      if (source) {
        const sourceModule = toFilePath(source.module);
        dependencies.push(new ModuleDependency(sourceModule));
        functionSettings = {
          type: 'source',
          data: `${toPosixRelative(projectRoot, sourceModule)}#${source.export}`,
        };
      } else if (app.source && functionModule) {
        await this.bundleFunction(functionModule, path.join(stageDir, BUNDLE_FILENAME));
        functionSettings = { type: 'serialized', data: `${BUNDLE_FILENAME}#${app.source.export}` };
      } else {
        const serialized: SerializedFunction = {
          name: app.fn.name || null,
          source: serializeFunction(app.fn, 'app function'),
        };
        await writeJsonFile(path.join(stageDir, FUNCTION_FILENAME), serialized);
        functionSettings = { type: 'serialized', data: FUNCTION_FILENAME };
      }

      await stageDependencies(dependencies, stageDir, { projectRoot, logger });

      if (serialize && functionModule) {
        await this.writePlaceholder(stageDir, projectRoot, functionModule);
      }
      await writeJsonFile(path.join(stageDir, CONTROLLER_FILENAME), packController(controller));

      await createArchive(stageDir, archivePath, this.config.archive);
      const content = await fs.readFile(archivePath);
      logger.debug(`Encoded ${functionSettings.type} app (${content.length} bytes)`);

      return {
        content,
        mediaType: { contentType: 'application/octet-stream', application: APP_MEDIA_TYPE },
        description: options.description ?? null,
        params: options.params ?? {},
        settings: {
          archive: this.config.archive,
          function: functionSettings,
          controller: CONTROLLER_FILENAME,
          parameters: bindings.map((binding) => binding.name),
        },
      };
    } finally {
      await removeDir(stageDir);
      await fs.rm(archivePath, { force: true });
    }
  }

  private mustSerialize(app: App, caller: string | undefined): boolean {
    if (this.config.forceSerialization || !app.source) return true;
    return caller !== undefined && toFilePath(caller) === toFilePath(app.source.module);
  }

  /**
   * Snapshot the function's module with everything it imports from the
   * project; npm packages stay external and resolve from the app's package.json.
   * The module's top-level statements run again when the runner loads the bundle.
   */
  private async bundleFunction(functionModule: string, outfile: string): Promise<void> {
    if (!(await pathExists(functionModule))) {
      throw new ConfigurationError(`Function module not found: ${functionModule}`);
    }
    const result = await build({
      entryPoints: [functionModule],
      outfile,
      bundle: true,
      platform: 'node',
      format: 'esm',
      target: 'node20',
      packages: 'external',
      logLevel: 'silent',
    });
    for (const warning of result.warnings) {
      this.config.logger.warn(`Bundling ${functionModule}: ${warning.text}`);
    }
  }

  /**
   * Declared dependencies; in serialized mode the function's own module is left out
   */
  private collectDependencies(app: App, projectRoot: string, excludedModule: string | null): Dependency[] {
    const { requirements = [], project = false, packages = [], modules = [], tarballs = [] } = app.depends;
    const deps: Dependency[] = [
      ...requirements.map((file) => new RequirementsDependency(file)),
      ...packages.map((spec) => new PackageDependency(spec)),
      ...tarballs.map((file) => new TarballDependency(file)),
    ];
    if (project) deps.push(new ProjectDependency());

    for (const module of modules) {
      const location = module.startsWith('file:') ? toFilePath(module) : path.resolve(projectRoot, module);
      if (location === excludedModule) continue;
      deps.push(new ModuleDependency(module));
    }
    return deps;
  }

  /**
   * Empty module at the function's declared path, so the staged tree still resolves it
   */
  private async writePlaceholder(stageDir: string, projectRoot: string, functionModule: string): Promise<void> {
    if (!isInside(projectRoot, functionModule)) {
      this.config.logger.debug(`Function module ${functionModule} is outside the project; no placeholder written`);
      return;
    }
    const target = path.join(stageDir, toPosixRelative(projectRoot, functionModule));
    if (await pathExists(target)) return;
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, PLACEHOLDER_MODULE, 'utf-8');
  }
}
