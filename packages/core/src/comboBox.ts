import { Control, type UpdateFunction } from './control.js';
import { ConfigurationError } from './errors.js';
import { reviveFunction, serializeFunction, withSource } from './functionSource.js';
import {
  CallableListModel,
  DefaultListModel,
  type ListData,
  type ListModel,
  type TitleFunction,
} from './listModel.js';
import type { PackedComboBox, PackedListData } from './packed.js';
import type { ComboBoxView, ControlOptions, View } from './types.js';

export interface ComboBoxOptions<T> extends ControlOptions {
  /** Fixed list, or a zero-argument producer called whenever the model is built */
  data?: ListData<T> | null;
  update?: UpdateFunction<ComboBox<T>>;
  /** Custom strategy; derived from `data` when omitted */
  model?: ListModel<T>;
  selected?: number;
  title?: TitleFunction<T>;
}

function isItemList<T>(data: ListData<T>): data is readonly T[] {
  return Array.isArray(data);
}

export class ComboBox<T = unknown> extends Control<ComboBoxView, T> {
  readonly kind = 'ComboBox' as const;

  data: ListData<T> | null;
  selected: number;
  title: TitleFunction<T> | undefined;

  protected readonly updateFunction: UpdateFunction<ComboBox<T>> | undefined;
  private readonly model: ListModel<T> | undefined;

  constructor(options: ComboBoxOptions<T> = {}) {
    super(options, false);
    this.data = options.data ?? null;
    this.updateFunction = options.update;
    this.model = options.model;
    this.selected = options.selected ?? 0;
    this.title = options.title;
  }

  /**
   * Model populated from the current data
   */
  getModel(): ListModel<T> {
    if (this.data === null) {
      throw new ConfigurationError(`ComboBox "${this.id}" has no data`);
    }
    const model = this.model ?? this.deriveModel();
    model.apply(this.data);
    return model;
  }

  private deriveModel(): ListModel<T> {
    const data: unknown = this.data;
    if (Array.isArray(data)) return new DefaultListModel<T>(this.title);
    if (typeof data === 'function') return new CallableListModel<T>(this.title);
    throw new ConfigurationError(`Unsupported data type of ComboBox "${this.id}": ${typeof data}`);
  }

  protected runUpdate(parents: readonly Control[]): void {
    this.updateFunction?.(this, parents);
  }

  protected accepts(view: View): view is ComboBoxView {
    return view.type === 'ComboBoxView';
  }

  protected takeView(view: ComboBoxView): void {
    this.selected = view.selected;
  }

  protected render(): ComboBoxView {
    return {
      type: 'ComboBoxView',
      id: this.id,
      enabled: this.enabled,
      label: this.label,
      optional: this.optional ?? false,
      selected: this.selected,
      titles: this.data === null ? null : this.getModel().titles(),
    };
  }

  protected resolveValue(): T | null {
    if (this.data === null || this.selected < 0) return null;
    return this.getModel().element(this.selected) ?? null;
  }

  pack(): PackedComboBox {
    if (this.model) {
      throw new ConfigurationError(`ComboBox "${this.id}" uses a custom list model and cannot be serialized`);
    }
    let data: PackedListData | null = null;
    if (this.data !== null) {
      data = isItemList(this.data)
        ? { type: 'list', items: [...this.data] }
        : { type: 'producer', source: serializeFunction(this.data, `list producer of "${this.id}"`) };
    }
    return {
      ...this.packBase(),
      kind: this.kind,
      data,
      selected: this.selected,
      title: this.title ? serializeFunction(this.title, `title function of "${this.id}"`) : null,
    };
  }

  static unpack(record: PackedComboBox): ComboBox<unknown> {
    const options: ComboBoxOptions<unknown> = {
      id: record.id,
      label: record.label,
      enabled: record.enabled,
      optional: record.optional,
      depends: record.depends,
      selected: record.selected,
    };
    if (record.data?.type === 'list') {
      options.data = record.data.items;
    } else if (record.data?.type === 'producer') {
      const source = record.data.source;
      const producer = reviveFunction(source, `list producer of "${record.id}"`);
      options.data = withSource((): readonly unknown[] => {
        const items = producer();
        if (!Array.isArray(items)) {
          throw new TypeError(`List producer returned ${typeof items}, expected an array`);
        }
        return items;
      }, source);
    }
    if (record.update !== null) {
      options.update = reviveFunction(record.update, `update function of "${record.id}"`);
    }
    if (record.title !== null) {
      const title = reviveFunction(record.title, `title function of "${record.id}"`);
      options.title = withSource((item: unknown) => String(title(item)), record.title);
    }
    return new ComboBox(options);
  }
}
