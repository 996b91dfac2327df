import { Control, type UpdateFunction } from './control.js';
import { ConfigurationError } from './errors.js';
import { reviveFunction, serializeFunction } from './functionSource.js';
import type { PackedTextField } from './packed.js';
import type { ControlOptions, TextFieldView, View } from './types.js';
import { FunctionalValidator, type Validator } from './validator.js';

export interface TextFieldOptions<T> extends ControlOptions {
  data?: string | null;
  update?: UpdateFunction<TextField<T>>;
  validator?: Validator<T>;
  /** Free-form input needs an Apply control unless this is false */
  requireApply?: boolean;
}

/**
 * Free-form text input, optionally converted by a validator
 */
export class TextField<T = string> extends Control<TextFieldView, T | string> {
  readonly kind = 'TextField' as const;

  data: string | null;

  protected readonly updateFunction: UpdateFunction<TextField<T>> | undefined;
  private readonly validator: Validator<T> | undefined;
  private validated: { data: string; value: T } | undefined;

  constructor(options: TextFieldOptions<T> = {}) {
    super(options, options.requireApply ?? true);
    this.data = options.data ?? null;
    this.updateFunction = options.update;
    this.validator = options.validator;
    this.validator?.bind(this);
  }

  protected runUpdate(parents: readonly Control[]): void {
    this.updateFunction?.(this, parents);
  }

  protected accepts(view: View): view is TextFieldView {
    return view.type === 'TextFieldView';
  }

  protected validate(view: TextFieldView): void {
    if (this.validator && view.data !== null) {
      this.validated = { data: view.data, value: this.validator.validate(view.data) };
    }
  }

  protected takeView(view: TextFieldView): void {
    this.data = view.data;
  }

  protected render(): TextFieldView {
    return {
      type: 'TextFieldView',
      id: this.id,
      enabled: this.enabled,
      label: this.label,
      optional: this.optional ?? false,
      data: this.data,
    };
  }

  protected resolveValue(): T | string | null {
    if (this.data === null) return null;
    if (!this.validator) return this.data;
    const cached = this.validated;
    if (cached && cached.data === this.data) return cached.value;
    const value = this.validator.validate(this.data);
    this.validated = { data: this.data, value };
    return value;
  }

  pack(): PackedTextField {
    let validator: string | null = null;
    if (this.validator instanceof FunctionalValidator) {
      validator = serializeFunction(this.validator.fn, `validator of "${this.id}"`);
    } else if (this.validator) {
      throw new ConfigurationError(`Validator of "${this.id}" is not a FunctionalValidator and cannot be serialized`);
    }
    return {
      ...this.packBase(),
      kind: this.kind,
      data: this.data,
      validator,
      requireApply: this.requireApply,
    };
  }

  static unpack(record: PackedTextField): TextField<unknown> {
    const options: TextFieldOptions<unknown> = {
      id: record.id,
      label: record.label,
      enabled: record.enabled,
      optional: record.optional,
      depends: record.depends,
      data: record.data,
      requireApply: record.requireApply,
    };
    if (record.update !== null) {
      options.update = reviveFunction(record.update, `update function of "${record.id}"`);
    }
    if (record.validator !== null) {
      options.validator = new FunctionalValidator(reviveFunction(record.validator, `validator of "${record.id}"`));
    }
    return new TextField(options);
  }
}
