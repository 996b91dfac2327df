/**
 * Filesystem helpers shared by staging, packaging and the execution store
 */

import { randomBytes } from 'crypto';
import * as fs from 'fs/promises';
import * as path from 'path';
import { fileURLToPath } from 'url';
import type { z } from 'zod';
import { formatZodError } from '@fn-forms/core';

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * Recursively delete directory; a missing directory is not an error
 */
export async function removeDir(dirPath: string): Promise<void> {
  await fs.rm(dirPath, { recursive: true, force: true });
}

/**
 * Write to a sibling temp file, then rename over the target
 */
export async function writeFileAtomic(filePath: string, content: string | Uint8Array): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.${randomBytes(4).toString('hex')}.tmp`
  );
  try {
    await fs.writeFile(tempPath, content);
    await fs.rename(tempPath, filePath);
  } catch (err) {
    await fs.rm(tempPath, { force: true });
    throw err;
  }
}

/**
 * Read and validate a JSON document
 */
export async function readJsonFile<S extends z.ZodType>(filePath: string, schema: S): Promise<z.output<S>> {
  const content = await fs.readFile(filePath, 'utf-8');
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to parse ${filePath}: ${message}`);
  }
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new Error(`Invalid ${filePath}: ${formatZodError(parsed.error)}`);
  }
  return parsed.data;
}

export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(data, null, 2), 'utf-8');
}

/**
 * Resolve `relativePath` under `baseDir`, refusing anything that escapes it
 */
export function resolveWithin(baseDir: string, relativePath: string, name: string): string {
  if (!relativePath.trim()) {
    throw new Error(`${name} must be a non-empty relative path`);
  }
  if (relativePath.includes('\0')) {
    throw new Error(`${name} must not contain null bytes`);
  }
  if (path.isAbsolute(relativePath)) {
    throw new Error(`${name} must be a relative path`);
  }
  const segments = relativePath.split(/[\\/]+/);
  if (segments.some((seg) => seg === '..')) {
    throw new Error(`${name} must not contain ".." segments`);
  }

  const resolvedBase = path.resolve(baseDir);
  const resolvedTarget = path.resolve(baseDir, relativePath);
  const relative = path.relative(resolvedBase, resolvedTarget);
  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new Error(`${name} must resolve within ${baseDir}`);
  }
  return resolvedTarget;
}

/**
 * Accept a filesystem path or a file: URL (such as import.meta.url)
 */
export function toFilePath(location: string): string {
  return location.startsWith('file:') ? fileURLToPath(location) : path.resolve(location);
}

/**
 * Project-relative path with forward slashes
 */
export function toPosixRelative(root: string, target: string): string {
  return path.relative(root, target).split(path.sep).join('/');
}

export function isInside(root: string, target: string): boolean {
  const relative = path.relative(root, target);
  return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
}

/**
 * Nearest directory at or above `start` holding a package.json
 */
export async function findProjectRoot(start: string): Promise<string> {
  let current = path.resolve(start);
  for (;;) {
    if (await pathExists(path.join(current, 'package.json'))) return current;
    const parent = path.dirname(current);
    if (parent === current) return path.resolve(start);
    current = parent;
  }
}
