import { Control, type UpdateFunction } from './control.js';
import { reviveFunction } from './functionSource.js';
import type { PackedSlider } from './packed.js';
import type { ControlOptions, SliderView, View } from './types.js';

export interface SliderOptions extends Omit<ControlOptions, 'optional'> {
  data?: Iterable<number>;
  update?: UpdateFunction<Slider>;
  selected?: number;
}

/**
 * Selection over a fixed numeric range. Never optional.
 */
export class Slider extends Control<SliderView, number> {
  readonly kind = 'Slider' as const;

  data: number[];
  selected: number;

  protected readonly updateFunction: UpdateFunction<Slider> | undefined;

  constructor(options: SliderOptions = {}) {
    super({ ...options, optional: false }, false);
    this.data = options.data ? Array.from(options.data) : [];
    this.updateFunction = options.update;
    this.selected = options.selected ?? 0;
  }

  protected runUpdate(parents: readonly Control[]): void {
    this.updateFunction?.(this, parents);
  }

  protected accepts(view: View): view is SliderView {
    return view.type === 'SliderView';
  }

  protected takeView(view: SliderView): void {
    this.selected = view.selected;
  }

  protected render(): SliderView {
    return {
      type: 'SliderView',
      id: this.id,
      enabled: this.enabled,
      label: this.label,
      optional: false,
      selected: this.selected,
      data: [...this.data],
    };
  }

  protected resolveValue(): number | null {
    return this.data[this.selected] ?? null;
  }

  pack(): PackedSlider {
    return {
      ...this.packBase(),
      kind: this.kind,
      data: [...this.data],
      selected: this.selected,
    };
  }

  static unpack(record: PackedSlider): Slider {
    return new Slider({
      id: record.id,
      label: record.label,
      enabled: record.enabled,
      depends: record.depends,
      data: record.data,
      selected: record.selected,
      update: record.update === null ? undefined : reviveFunction(record.update, `update function of "${record.id}"`),
    });
  }
}
