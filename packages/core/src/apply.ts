import { Control } from './control.js';
import type { PackedApply } from './packed.js';
import type { ApplyView, ControlOptions, View } from './types.js';

/**
 * Gate for running the function. Enabled once every required sibling has a value.
 */
export class Apply extends Control<ApplyView, never> {
  readonly kind = 'Apply' as const;

  protected readonly updateFunction = undefined;

  constructor(options: Omit<ControlOptions, 'depends'> = {}) {
    super(options, false);
  }

  protected accepts(view: View): view is ApplyView {
    return view.type === 'ApplyView';
  }

  protected takeView(_view: ApplyView): void {}

  protected runUpdate(): void {}

  protected render(): ApplyView {
    return {
      type: 'ApplyView',
      id: this.id,
      enabled: this.isReady(),
      label: this.label,
      optional: this.optional ?? false,
    };
  }

  private isReady(): boolean {
    for (const control of this.owner.controls()) {
      if (control === this || control.optional === true) continue;
      if (control.value() === null) return false;
    }
    return true;
  }

  protected resolveValue(): null {
    return null;
  }

  pack(): PackedApply {
    return { ...this.packBase(), kind: this.kind };
  }

  static unpack(record: PackedApply): Apply {
    return new Apply({
      id: record.id,
      label: record.label,
      enabled: record.enabled,
      optional: record.optional,
    });
  }
}
