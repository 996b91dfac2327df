/**
 * AppDecoder - unpacks an encoded app into a runnable directory
 */

import { randomUUID } from 'crypto';
import * as fs from 'fs/promises';
import * as path from 'path';
import { ConfigurationError, formatZodError } from '@fn-forms/core';
import { archiveExtension, extractArchive } from './archive.js';
import { resolveDecoderConfig, type AppDecoderOptions, type DecoderConfig } from './config.js';
import { AppExecutor } from './executor.js';
import { removeDir } from './fsUtils.js';
import { EXECUTE_SCRIPT, RUNNER_URL } from './runtime.js';
import { appSettingsSchema, type AppSettings } from './types.js';

/**
 * Anything carrying an archive and its settings; FrameData qualifies
 */
export interface EncodedApp {
  content: Uint8Array;
  settings: unknown;
}

function renderExecuteScript(settings: AppSettings): string {
  return [
    `import { main } from ${JSON.stringify(RUNNER_URL)};`,
    '',
    `await main(process.argv, ${JSON.stringify(settings, null, 2)});`,
    '',
  ].join('\n');
}

export class AppDecoder {
  private readonly config: DecoderConfig;

  constructor(options: AppDecoderOptions = {}) {
    this.config = resolveDecoderConfig(options);
  }

  async decode(app: EncodedApp): Promise<AppExecutor> {
    const parsed = appSettingsSchema.safeParse(app.settings);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid app settings: ${formatZodError(parsed.error)}`);
    }
    const settings = parsed.data;

    const appDir = await this.prepareAppDir();
    await fs.mkdir(this.config.tempDir, { recursive: true });
    const archivePath = path.join(this.config.tempDir, `fn-forms-${randomUUID()}${archiveExtension(settings.archive)}`);
    try {
      await fs.writeFile(archivePath, app.content);
      await extractArchive(archivePath, appDir, settings.archive);
    } finally {
      await fs.rm(archivePath, { force: true });
    }

    await fs.writeFile(path.join(appDir, EXECUTE_SCRIPT), renderExecuteScript(settings), 'utf-8');
    this.config.logger.debug(`Decoded app into ${appDir}`);
    return new AppExecutor(appDir, this.config.executor);
  }

  private async prepareAppDir(): Promise<string> {
    if (this.config.appDir === null) {
      await fs.mkdir(this.config.tempDir, { recursive: true });
      return fs.mkdtemp(path.join(this.config.tempDir, 'fn-forms-app-'));
    }
    const appDir = path.resolve(this.config.appDir);
    await removeDir(appDir);
    await fs.mkdir(appDir, { recursive: true });
    return appDir;
  }
}
