/**
 * Dependency staging
 *
 * Staged layout:
 *   <root>/<project-relative path>   source files
 *   <root>/tarballs/<name>.tgz       prebuilt packages
 *   <root>/package.json              accumulated npm dependencies
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { glob } from 'glob';
import { z } from 'zod';
import { ConfigurationError, NoSuchModuleError } from '@fn-forms/core';
import { isInside, pathExists, readJsonFile, toFilePath, toPosixRelative } from './fsUtils.js';
import type { Logger } from './logger.js';

export const STAGED_MANIFEST = 'package.json';
export const TARBALLS_DIRNAME = 'tarballs';

/** Files taken from a project or module directory */
const SOURCE_PATTERN = '**/*.{ts,mts,cts,js,mjs,cjs,json}';

const IGNORED = ['**/node_modules/**', '**/dist/**', '**/.git/**', 'package.json', 'package-lock.json'];

export interface StagingContext {
  projectRoot: string;
  logger?: Logger;
}

const manifestSchema = z.object({
  dependencies: z.record(z.string(), z.string()).default({}),
});

export interface StagedSource {
  stage(root: string): Promise<void>;
}

/**
 * File copied to the same relative path under the stage root
 */
export class SourceFile implements StagedSource {
  constructor(
    readonly relative: string,
    readonly absolute: string
  ) {}

  async stage(root: string): Promise<void> {
    const target = path.join(root, this.relative);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.copyFile(this.absolute, target);
  }
}

export class TarballFile extends SourceFile {
  constructor(absolute: string) {
    super(path.posix.join(TARBALLS_DIRNAME, path.basename(absolute)), absolute);
  }
}

/**
 * Entries accumulated into the staged package.json
 */
export abstract class MergeableSource implements StagedSource {
  abstract readonly dependencies: Readonly<Record<string, string>>;

  async stage(root: string): Promise<void> {
    const manifestPath = path.join(root, STAGED_MANIFEST);
    const existing = (await pathExists(manifestPath))
      ? (await readJsonFile(manifestPath, manifestSchema)).dependencies
      : {};
    await writeStagedManifest(root, { ...existing, ...this.dependencies });
  }
}

export class DownloadablePackage extends MergeableSource {
  readonly dependencies: Readonly<Record<string, string>>;

  constructor(
    readonly name: string,
    readonly version: string
  ) {
    super();
    this.dependencies = { [name]: version };
  }
}

export class Requirements extends MergeableSource {
  constructor(readonly dependencies: Readonly<Record<string, string>>) {
    super();
  }
}

export async function writeStagedManifest(root: string, dependencies: Record<string, string>): Promise<void> {
  const manifest = { private: true, type: 'module', dependencies };
  await fs.mkdir(root, { recursive: true });
  await fs.writeFile(path.join(root, STAGED_MANIFEST), JSON.stringify(manifest, null, 2), 'utf-8');
}

export abstract class Dependency {
  abstract collect(context: StagingContext): Promise<StagedSource[]>;

  /** Equal keys mean equal dependencies */
  abstract key(): string;

  toString(): string {
    return `${this.constructor.name}(${this.key()})`;
  }
}

async function collectSources(root: string, dir: string): Promise<SourceFile[]> {
  const matches = await glob(SOURCE_PATTERN, {
    cwd: dir,
    nodir: true,
    dot: false,
    ignore: IGNORED,
    absolute: true,
  });
  return matches.sort().map((file) => new SourceFile(toPosixRelative(root, file), file));
}

/**
 * Absolute location of a project file or directory; null when it does not exist
 */
async function locateInProject(projectRoot: string, module: string): Promise<string | null> {
  const absolute = path.isAbsolute(module) || module.startsWith('file:')
    ? toFilePath(module)
    : path.resolve(projectRoot, module);
  if (!isInside(projectRoot, absolute)) {
    throw new ConfigurationError(`Module ${module} is outside of the project ${projectRoot}`);
  }
  return (await pathExists(absolute)) ? absolute : null;
}

async function collectModule(projectRoot: string, location: string): Promise<SourceFile[]> {
  const stat = await fs.stat(location);
  if (stat.isDirectory()) {
    return collectSources(projectRoot, location);
  }
  return [new SourceFile(toPosixRelative(projectRoot, location), location)];
}

export class RequirementsDependency extends Dependency {
  constructor(readonly file: string) {
    super();
  }

  key(): string {
    return `requirements:${this.file}`;
  }

  async collect(context: StagingContext): Promise<StagedSource[]> {
    const location = path.resolve(context.projectRoot, this.file);
    if (!(await pathExists(location))) {
      throw new NoSuchModuleError(this.file);
    }
    const { dependencies } = await readJsonFile(location, manifestSchema);
    return [new Requirements(dependencies)];
  }
}

/**
 * Every source file of the project
 */
export class ProjectDependency extends Dependency {
  key(): string {
    return 'project';
  }

  async collect(context: StagingContext): Promise<StagedSource[]> {
    return collectSources(context.projectRoot, context.projectRoot);
  }
}

/**
 * One project file, or every source file of a project directory
 */
export class ModuleDependency extends Dependency {
  constructor(readonly module: string) {
    super();
  }

  key(): string {
    return `module:${this.module}`;
  }

  async collect(context: StagingContext): Promise<StagedSource[]> {
    const location = await locateInProject(context.projectRoot, this.module);
    const sources = location ? await collectModule(context.projectRoot, location) : [];
    if (sources.length === 0) {
      throw new NoSuchModuleError(this.module);
    }
    return sources;
  }
}

/**
 * Split `name@version`, keeping the scope of `@scope/name@version`
 */
export function parsePackageSpec(spec: string): { name: string; version: string | null } {
  const at = spec.lastIndexOf('@');
  if (at <= 0) return { name: spec, version: null };
  return { name: spec.slice(0, at), version: spec.slice(at + 1) || null };
}

const installedManifestSchema = z.object({ version: z.string() });

/**
 * Version of `name` as node would resolve it from `fromDir`
 */
export async function findInstalledVersion(name: string, fromDir: string): Promise<string | null> {
  let current = path.resolve(fromDir);
  for (;;) {
    const manifestPath = path.join(current, 'node_modules', ...name.split('/'), 'package.json');
    if (await pathExists(manifestPath)) {
      return (await readJsonFile(manifestPath, installedManifestSchema)).version;
    }
    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

/**
 * Project directory of that name when there is one, otherwise a pinned npm dependency
 */
export class PackageDependency extends Dependency {
  readonly name: string;
  readonly version: string | null;

  constructor(readonly spec: string) {
    super();
    const parsed = parsePackageSpec(spec);
    if (!parsed.name) {
      throw new ConfigurationError(`Invalid package spec: ${spec}`);
    }
    this.name = parsed.name;
    this.version = parsed.version;
  }

  key(): string {
    return `package:${this.spec}`;
  }

  async isLocal(context: StagingContext): Promise<boolean> {
    if (this.version !== null || this.name.startsWith('@')) return false;
    return pathExists(path.join(context.projectRoot, this.name));
  }

  async collect(context: StagingContext): Promise<StagedSource[]> {
    if (await this.isLocal(context)) {
      const sources = await collectModule(context.projectRoot, path.join(context.projectRoot, this.name));
      if (sources.length > 0) return sources;
    }
    const version = this.version ?? (await findInstalledVersion(this.name, context.projectRoot));
    if (version === null) {
      throw new NoSuchModuleError(this.name);
    }
    return [new DownloadablePackage(this.name, version)];
  }
}

export class TarballDependency extends Dependency {
  constructor(readonly file: string) {
    super();
  }

  key(): string {
    return `tarball:${this.file}`;
  }

  async collect(context: StagingContext): Promise<StagedSource[]> {
    const location = path.resolve(context.projectRoot, this.file);
    if (!(await pathExists(location))) {
      throw new NoSuchModuleError(this.file);
    }
    return [new TarballFile(location)];
  }
}

/**
 * Collapse identical dependencies; a project dependency covers modules and local packages
 */
export async function dedupeDependencies(
  deps: readonly Dependency[],
  context: StagingContext
): Promise<Dependency[]> {
  const hasProject = deps.some((dep) => dep instanceof ProjectDependency);
  const seen = new Set<string>();
  const result: Dependency[] = [];

  for (const dep of deps) {
    if (seen.has(dep.key())) continue;
    if (hasProject && dep instanceof ModuleDependency) continue;
    if (hasProject && dep instanceof PackageDependency && (await dep.isLocal(context))) continue;
    seen.add(dep.key());
    result.push(dep);
  }
  return result;
}

/**
 * Stage every dependency under `root`. The root and its package.json always exist afterwards.
 */
export async function stageDependencies(
  deps: readonly Dependency[],
  root: string,
  context: StagingContext
): Promise<void> {
  await fs.mkdir(root, { recursive: true });

  for (const dep of await dedupeDependencies(deps, context)) {
    const sources = await dep.collect(context);
    context.logger?.debug(`Staging ${dep}: ${sources.length} source(s)`);
    for (const source of sources) {
      await source.stage(root);
    }
  }

  if (!(await pathExists(path.join(root, STAGED_MANIFEST)))) {
    await writeStagedManifest(root, {});
  }
}

