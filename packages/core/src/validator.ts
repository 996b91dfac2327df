/**
 * Text validators bound to a control id
 */

import { ConfigurationError, ValidationError } from './errors.js';

export abstract class Validator<T> {
  private controlId: string | null = null;

  /**
   * Assign the owning control (exactly once)
   */
  bind(control: { readonly id: string }): void {
    if (this.controlId !== null && this.controlId !== control.id) {
      throw new ConfigurationError(
        `Validator is already bound to control "${this.controlId}", cannot bind it to "${control.id}"`
      );
    }
    this.controlId = control.id;
  }

  abstract validate(value: string): T;

  protected fail(cause: unknown): never {
    throw new ValidationError(this.controlId ?? '<unbound>', cause);
  }
}

export class FunctionalValidator<T> extends Validator<T> {
  constructor(readonly fn: (value: string) => T) {
    super();
  }

  validate(value: string): T {
    try {
      return this.fn(value);
    } catch (cause) {
      return this.fail(cause);
    }
  }
}

// Validator bodies stay self-contained: they are serialized by source.

export function intValidator(): Validator<number> {
  return new FunctionalValidator((value: string): number => {
    const text = value.trim();
    if (!/^[+-]?\d+$/.test(text)) {
      throw new Error(`invalid literal for int: '${value}'`);
    }
    const parsed = Number.parseInt(text, 10);
    if (!Number.isSafeInteger(parsed)) {
      throw new Error(`integer out of safe range: '${value}'`);
    }
    return parsed;
  });
}

export function floatValidator(): Validator<number> {
  return new FunctionalValidator((value: string): number => {
    const text = value.trim();
    const parsed = Number(text);
    if (text === '' || !Number.isFinite(parsed)) {
      throw new Error(`could not convert string to float: '${value}'`);
    }
    return parsed;
  });
}
