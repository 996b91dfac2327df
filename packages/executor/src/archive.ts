/**
 * tar archives of staged app directories (system tar)
 */

import { execFile } from 'child_process';
import * as fs from 'fs/promises';
import { promisify } from 'util';
import type { ArchiveFormat } from './types.js';

const execFileAsync = promisify(execFile);

export function archiveExtension(format: ArchiveFormat): string {
  return format === 'tar.gz' ? '.tar.gz' : '.tar';
}

async function runTar(args: string[], action: string): Promise<void> {
  try {
    await execFileAsync('tar', args);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to ${action}: ${message}`, { cause: err });
  }
}

/**
 * Archive the contents of `sourceDir` (not the directory itself)
 */
export async function createArchive(sourceDir: string, archivePath: string, format: ArchiveFormat): Promise<void> {
  const mode = format === 'tar.gz' ? '-czf' : '-cf';
  await runTar([mode, archivePath, '-C', sourceDir, '.'], `create archive ${archivePath}`);
}

export async function extractArchive(archivePath: string, targetDir: string, format: ArchiveFormat): Promise<void> {
  await fs.mkdir(targetDir, { recursive: true });
  const mode = format === 'tar.gz' ? '-xzf' : '-xf';
  await runTar([mode, archivePath, '-C', targetDir], `extract archive ${archivePath}`);
}
