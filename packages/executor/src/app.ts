/**
 * App definition: a function plus the explicit table binding its parameters to controls
 */

import type { z } from 'zod';
import { ConfigurationError, type Control } from '@fn-forms/core';

export type ParamKind = 'string' | 'number' | 'integer' | 'boolean' | 'bytes' | 'any';

export class ParamDescriptor {
  constructor(
    readonly kind: ParamKind,
    readonly optional: boolean
  ) {}

  toString(): string {
    return this.optional ? `${this.kind} | null` : this.kind;
  }
}

export function required(kind: ParamKind = 'any'): ParamDescriptor {
  return new ParamDescriptor(kind, false);
}

export function optional(kind: ParamKind = 'any'): ParamDescriptor {
  return new ParamDescriptor(kind, true);
}

/**
 * Parameter type: a descriptor, or a zod schema (optional when it accepts undefined or null)
 */
export type ParamType = ParamDescriptor | z.ZodType;

export interface ParamBinding {
  name: string;
  control: Control;
  /** Omitted: the parameter takes whatever optionality its control declares */
  type?: ParamType;
}

/** One binding per function parameter, in order */
export type BindingTable<P extends readonly unknown[]> = { [K in keyof P]: ParamBinding };

/**
 * Durable identity of the function: the module defining it and its export name
 */
export interface FunctionSource {
  /** Path or file: URL, usually import.meta.url */
  module: string;
  export: string;
}

export interface AppDependencies {
  /** package.json-style files (relative to the project root) whose dependencies are merged */
  requirements?: string[];
  /** Stage every source file of the project */
  project?: boolean;
  /** Package specs (`name` or `name@version`), staged locally when the project holds them */
  packages?: string[];
  /** Project files or directories */
  modules?: string[];
  /** Prebuilt package tarballs */
  tarballs?: string[];
}

export type AppFunction = (...args: never[]) => unknown;

export interface AppDefinition<F extends AppFunction> {
  fn: F;
  params: BindingTable<Parameters<F>> & readonly ParamBinding[];
  source?: FunctionSource;
  depends?: AppDependencies;
}

export interface App {
  readonly fn: AppFunction;
  readonly params: readonly ParamBinding[];
  readonly source: FunctionSource | null;
  readonly depends: AppDependencies;
}

export function defineApp<F extends AppFunction>(definition: AppDefinition<F>): App {
  return {
    fn: definition.fn,
    params: [...definition.params],
    source: definition.source ?? null,
    depends: definition.depends ?? {},
  };
}

/**
 * Whether the parameter accepts a missing value; null when the binding has no type
 */
export function isOptionalType(type: ParamType | undefined): boolean | null {
  if (type === undefined) return null;
  if (type instanceof ParamDescriptor) return type.optional;
  return type.safeParse(undefined).success || type.safeParse(null).success;
}

export interface ResolvedBinding {
  name: string;
  control: Control;
  /** Reconciled optionality the control is packaged with */
  optional: boolean;
}

/**
 * Check the binding table against the function and reconcile optionality.
 * Controls are left untouched; the result carries the reconciled value.
 */
export function resolveBindings(app: App, options: { strict?: boolean } = {}): ResolvedBinding[] {
  const strict = options.strict ?? true;

  if (app.params.length < app.fn.length) {
    const unbound = app.fn.length - app.params.length;
    throw new ConfigurationError(
      `Function declares ${app.fn.length} parameters but only ${app.params.length} are bound (${unbound} unbound)`
    );
  }

  const names = new Set<string>();
  const controls = new Set<string>();
  const resolved: ResolvedBinding[] = [];

  for (const binding of app.params) {
    if (!binding.name) {
      throw new ConfigurationError('Parameter name must not be empty');
    }
    if (names.has(binding.name)) {
      throw new ConfigurationError(`Parameter '${binding.name}' is bound twice`);
    }
    if (controls.has(binding.control.id)) {
      throw new ConfigurationError(`Control "${binding.control.id}" is bound to more than one parameter`);
    }
    names.add(binding.name);
    controls.add(binding.control.id);

    resolved.push({
      name: binding.name,
      control: binding.control,
      optional: reconcileOptional(binding, strict),
    });
  }

  return resolved;
}

function reconcileOptional(binding: ParamBinding, strict: boolean): boolean {
  const declared = binding.control.optional;
  const parameter = isOptionalType(binding.type);

  if (parameter === null) return declared ?? false;
  if (declared === null || declared === parameter) return parameter;

  if (strict) {
    const expected = parameter ? 'optional' : 'not optional';
    const actual = declared ? 'optional' : 'not optional';
    throw new ConfigurationError(
      `Parameter '${binding.name}' is ${expected} but the control ${binding.control} is ${actual}`
    );
  }
  return false;
}
