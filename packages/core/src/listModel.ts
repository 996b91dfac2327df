/**
 * ListModel: turns raw combo box data into a titled, indexable sequence
 */

export type TitleFunction<T> = (item: T) => string;

export type ListProducer<T> = () => readonly T[];

export type ListData<T> = readonly T[] | ListProducer<T>;

export abstract class ListModel<T, D = ListData<T>> {
  abstract apply(data: D): void;

  abstract size(): number;

  /** Element at `index`, undefined when out of range */
  abstract element(index: number): T | undefined;

  abstract title(index: number): string;

  titles(): string[] {
    const result: string[] = [];
    for (let i = 0; i < this.size(); i++) {
      result.push(this.title(i));
    }
    return result;
  }
}

export abstract class AbstractListModel<T, D> extends ListModel<T, D> {
  protected items: readonly T[] = [];

  constructor(readonly titleFunction?: TitleFunction<T>) {
    super();
  }

  size(): number {
    return this.items.length;
  }

  element(index: number): T | undefined {
    return index >= 0 && index < this.items.length ? this.items[index] : undefined;
  }

  title(index: number): string {
    const item = this.element(index);
    return this.titleFunction && item !== undefined ? this.titleFunction(item) : String(item);
  }
}

export class DefaultListModel<T> extends AbstractListModel<T, readonly T[]> {
  apply(data: readonly T[]): void {
    this.items = data;
  }
}

export class CallableListModel<T> extends AbstractListModel<T, ListProducer<T>> {
  apply(data: ListProducer<T>): void {
    const produced = data();
    if (!Array.isArray(produced)) {
      throw new TypeError(`List producer returned ${typeof produced}, expected an array`);
    }
    this.items = produced;
  }
}
