/**
 * Capture functions by value (source text) and revive them in a fresh scope.
 *
 * Revived functions see only globals: anything they need must be written
 * inside the function body.
 */

import { ConfigurationError } from './errors.js';

export type RevivedFunction = (...args: unknown[]) => unknown;

const NATIVE_CODE = /\{\s*\[native code\]\s*\}\s*$/;

export function serializeFunction(fn: (...args: never[]) => unknown, what: string): string {
  const source = fn.toString().trim();
  if (NATIVE_CODE.test(source)) {
    throw new ConfigurationError(`Cannot serialize ${what}: native or bound functions have no source`);
  }
  return source;
}

// Loaders running esbuild with keepNames (tsx) wrap nested functions in __name(...)
const PRELUDE = '"use strict";\nconst __name = (target) => target;\n';

function compile(source: string): unknown {
  try {
    return new Function(`${PRELUDE}return (${source});`)();
  } catch (err) {
    if (!(err instanceof SyntaxError)) throw err;
  }
  // Method shorthand, e.g. `update(control, parents) { ... }`
  const holder: unknown = new Function(`${PRELUDE}return ({ ${source} });`)();
  if (holder && typeof holder === 'object') {
    return Object.values(holder)[0];
  }
  return undefined;
}

export function reviveFunction(source: string, what: string): RevivedFunction {
  let compiled: unknown;
  try {
    compiled = compile(source);
  } catch (err) {
    throw new ConfigurationError(`Cannot revive ${what}`, { cause: err });
  }
  if (typeof compiled !== 'function') {
    throw new ConfigurationError(`Cannot revive ${what}: source is not a function`);
  }
  return withSource(toCallable(compiled, what), source);
}

/**
 * Typed view of a function obtained at run time (arity preserved)
 */
export function toCallable(value: unknown, what: string): RevivedFunction {
  if (typeof value !== 'function') {
    throw new ConfigurationError(`${what} is not a function`);
  }
  const fn = value;
  const callable: RevivedFunction = (...args) => Reflect.apply(fn, undefined, args);
  Object.defineProperty(callable, 'length', { value: fn.length });
  return callable;
}

/**
 * Make `fn` serialize as `source` (wrappers around revived functions)
 */
export function withSource<F extends (...args: never[]) => unknown>(fn: F, source: string): F {
  fn.toString = () => source;
  return fn;
}
