/**
 * Control: one node of the dependency graph
 */

import { randomUUID } from 'crypto';
import { UnknownControlError, UpdateError, ValidationError } from './errors.js';
import { serializeFunction, withSource } from './functionSource.js';
import type { PackedControl, PackedControlBase } from './packed.js';
import type { ControlKind, ControlOptions, ControlRef, InvalidationPolicy, View } from './types.js';

/**
 * Recomputes `control` from its resolved parents. May only mutate `control`.
 */
export type UpdateFunction<C> = (control: C, parents: readonly Control[]) => void;

/**
 * Adapt an update function taking its parents as separate arguments:
 *
 *   update: spreadParents((control: TextField, base: Control) => { ... })
 *
 * The adapter serializes with the wrapped function's source inlined.
 */
export function spreadParents<C>(fn: (control: C, ...parents: Control[]) => void): UpdateFunction<C> {
  const source = `(control, parents) => (${serializeFunction(fn, 'update function')})(control, ...parents)`;
  return withSource((control: C, parents: readonly Control[]) => fn(control, ...parents), source);
}

/**
 * Where a control looks up its parents and siblings
 */
export interface ControlGraph {
  readonly invalidation: InvalidationPolicy;
  resolve(id: string): Control;
  controls(): Iterable<Control>;
}

function refId(ref: ControlRef): string {
  return typeof ref === 'string' ? ref : ref.id;
}

function isRefList(depends: ControlRef | readonly ControlRef[]): depends is readonly ControlRef[] {
  return Array.isArray(depends);
}

function toRefs(depends: ControlOptions['depends']): readonly ControlRef[] {
  if (depends === undefined) return [];
  return isRefList(depends) ? depends : [depends];
}

/**
 * Graph of a control not registered in a Controller: only the controls
 * passed to `depends` are reachable.
 */
class StandaloneGraph implements ControlGraph {
  readonly invalidation: InvalidationPolicy = 'self';
  private readonly known = new Map<string, Control>();

  constructor(owner: Control, refs: readonly ControlRef[]) {
    this.known.set(owner.id, owner);
    for (const ref of refs) {
      if (ref instanceof Control) this.known.set(ref.id, ref);
    }
  }

  resolve(id: string): Control {
    const control = this.known.get(id);
    if (!control) throw new UnknownControlError(id);
    return control;
  }

  controls(): Iterable<Control> {
    return this.known.values();
  }
}

export abstract class Control<V extends View = View, T = unknown> {
  abstract readonly kind: ControlKind;

  readonly id: string;
  label: string | null;
  enabled: boolean;
  optional: boolean | null;

  /** Each variant keeps its own typed function and invokes it in `runUpdate` */
  protected abstract readonly updateFunction: UpdateFunction<never> | undefined;

  private readonly refs: readonly ControlRef[];
  protected readonly requireApply: boolean;
  private graph: ControlGraph;
  private pendingView: V | undefined;
  private dirty = true;
  private revisionCount = 0;
  private parentRevisions = new Map<string, number>();

  protected constructor(options: ControlOptions, requireApply: boolean) {
    this.id = options.id ?? randomUUID();
    this.label = options.label ?? null;
    this.enabled = options.enabled ?? true;
    this.optional = options.optional ?? null;
    this.refs = toRefs(options.depends);
    this.requireApply = requireApply;
    this.graph = new StandaloneGraph(this, this.refs);
  }

  get parentIds(): readonly string[] {
    return this.refs.map(refId);
  }

  /**
   * Parents given as control objects (ids are resolved by the graph)
   */
  get parentControls(): readonly Control[] {
    return this.refs.filter((ref): ref is Control => ref instanceof Control);
  }

  /**
   * Bumped whenever a pending view is taken in or the update function succeeds
   */
  get revision(): number {
    return this.revisionCount;
  }

  /**
   * Re-home this control in a graph (done by Controller)
   */
  attach(graph: ControlGraph): void {
    this.graph = graph;
  }

  protected get owner(): ControlGraph {
    return this.graph;
  }

  isDependent(): boolean {
    return this.refs.length > 0;
  }

  isApplyRequired(): boolean {
    return this.isDependent() || this.requireApply;
  }

  view(): V {
    this.update();
    return this.render();
  }

  /**
   * Validate `view` and buffer it for the next update
   */
  apply(view: View): void {
    if (view.id !== this.id) {
      throw new ValidationError(this.id, new Error(`View "${view.id}" does not belong to this control`));
    }
    if (!this.accepts(view)) {
      throw new ValidationError(this.id, new Error(`${view.type} cannot be applied to ${this.kind}`));
    }
    this.validate(view);
    this.pendingView = view;
  }

  value(): T | null {
    this.update();
    return this.resolveValue();
  }

  protected update(): void {
    if (this.pendingView) {
      this.takeView(this.pendingView);
      this.pendingView = undefined;
      this.dirty = true;
      this.revisionCount++;
    }

    if (!this.updateFunction) return;

    const parents = this.parentIds.map((id) => this.graph.resolve(id));
    for (const parent of parents) {
      parent.update();
    }

    if (this.graph.invalidation === 'transitive' && !this.dirty) {
      this.dirty = parents.some((parent) => this.parentRevisions.get(parent.id) !== parent.revision);
    }

    if (this.dirty) {
      try {
        this.runUpdate(parents);
      } catch (err) {
        throw new UpdateError(this.id, err);
      }
      this.dirty = false;
      this.revisionCount++;
      this.parentRevisions = new Map(parents.map((parent) => [parent.id, parent.revision]));
    }
  }

  protected packBase(): PackedControlBase {
    return {
      id: this.id,
      label: this.label,
      enabled: this.enabled,
      optional: this.optional,
      depends: [...this.parentIds],
      update: this.updateFunction ? serializeFunction(this.updateFunction, `update function of "${this.id}"`) : null,
    };
  }

  /** JSON form of this control (functions captured by source) */
  abstract pack(): PackedControl;

  protected validate(_view: V): void {}

  /** Call the update function with this control and its resolved parents */
  protected abstract runUpdate(parents: readonly Control[]): void;

  protected abstract accepts(view: View): view is V;

  /** Copy view fields into this control */
  protected abstract takeView(view: V): void;

  protected abstract render(): V;

  protected abstract resolveValue(): T | null;

  toString(): string {
    return `${this.kind}(id=${this.id})`;
  }
}
