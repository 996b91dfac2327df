/**
 * Console logger with a scope prefix
 */

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/** Set to any non-empty value to print debug messages */
export const DEBUG_ENV = 'FN_FORMS_DEBUG';

export function createLogger(scope: string): Logger {
  const prefix = `[fn-forms:${scope}]`;
  return {
    debug(message, ...args) {
      if (process.env[DEBUG_ENV]) console.debug(`${prefix} ${message}`, ...args);
    },
    info(message, ...args) {
      console.log(`${prefix} ${message}`, ...args);
    },
    warn(message, ...args) {
      console.warn(`${prefix} ${message}`, ...args);
    },
    error(message, ...args) {
      console.error(`${prefix} ${message}`, ...args);
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
