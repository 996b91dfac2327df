/**
 * Where the execution runner lives, and how node has to be started to load it
 */

import * as path from 'path';
import { fileURLToPath } from 'url';

// .ts when running from sources, .js once built
const RUNTIME_EXTENSION = path.extname(fileURLToPath(import.meta.url));

/** Script the decoder writes into the app directory */
export const EXECUTE_SCRIPT = 'execute.mjs';

export const RUNNER_URL = new URL(`./runner${RUNTIME_EXTENSION}`, import.meta.url).href;

/**
 * TypeScript sources need the tsx loader in the child process
 */
export function defaultNodeArgs(): string[] {
  return RUNTIME_EXTENSION === '.ts' ? ['--import', 'tsx'] : [];
}
