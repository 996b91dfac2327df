/**
 * Controller: the control arena of one form
 *
 * Controls are registered by id; parents are looked up by id through the
 * controller, so a graph rebuilt from its packed form needs no re-linking.
 */

import { Apply } from './apply.js';
import type { Control, ControlGraph } from './control.js';
import { ConfigurationError, UnknownControlError } from './errors.js';
import type { InvalidationPolicy, View } from './types.js';

export interface ControllerOptions {
  /** Default 'self' */
  invalidation?: InvalidationPolicy;
  /** Ids of the controls passed to the function, in call order. Default: every non-Apply control. */
  parameters?: readonly string[];
}

export type FormFunction = (...args: never[]) => unknown;

export class Controller implements ControlGraph {
  readonly invalidation: InvalidationPolicy;

  private readonly registry = new Map<string, Control>();
  private readonly parameterIds: readonly string[];

  constructor(controls: readonly Control[], options: ControllerOptions = {}) {
    this.invalidation = options.invalidation ?? 'self';

    let applyControl: Control | undefined;
    for (const control of controls) {
      if (this.registry.has(control.id)) {
        throw new ConfigurationError(`Duplicate control id "${control.id}"`);
      }
      if (control.kind === 'Apply') {
        if (applyControl) {
          throw new ConfigurationError('Apply must appear only once');
        }
        applyControl = control;
      }
      this.registry.set(control.id, control);
    }

    for (const control of controls) {
      for (const parentId of control.parentIds) {
        if (!this.registry.has(parentId)) {
          throw new ConfigurationError(`Control "${control.id}" depends on unregistered control "${parentId}"`);
        }
      }
    }
    this.assertAcyclic();

    if (!applyControl && controls.some((control) => control.isApplyRequired())) {
      const apply = new Apply();
      this.registry.set(apply.id, apply);
    }

    for (const control of this.registry.values()) {
      control.attach(this);
    }

    this.parameterIds = options.parameters
      ? [...options.parameters]
      : controls.filter((control) => control.kind !== 'Apply').map((control) => control.id);
    for (const id of this.parameterIds) {
      if (!this.registry.has(id)) {
        throw new ConfigurationError(`Parameter control "${id}" is not registered`);
      }
    }
  }

  get parameters(): readonly string[] {
    return this.parameterIds;
  }

  get(id: string): Control | undefined {
    return this.registry.get(id);
  }

  resolve(id: string): Control {
    const control = this.registry.get(id);
    if (!control) throw new UnknownControlError(id);
    return control;
  }

  controls(): Control[] {
    return [...this.registry.values()];
  }

  /**
   * Apply edits, then render every control in registration order
   */
  list(views: readonly View[] = []): View[] {
    this.applyViews(views);
    return this.controls().map((control) => control.view());
  }

  /**
   * Apply edits, resolve parameter values and call `fn` with them
   */
  apply(fn: FormFunction, views: readonly View[] = []): unknown {
    this.applyViews(views);
    const values = this.parameterIds.map((id) => this.resolve(id).value());
    if (fn.length > values.length) {
      throw new ConfigurationError(
        `Function expects ${fn.length} arguments but the controller provides ${values.length}`
      );
    }
    return Reflect.apply(fn, undefined, values);
  }

  private applyViews(views: readonly View[]): void {
    for (const view of views) {
      this.resolve(view.id).apply(view);
    }
  }

  /**
   * Depth-first walk over parent edges; a back edge is a cycle
   */
  private assertAcyclic(): void {
    const done = new Set<string>();
    const path: string[] = [];

    const visit = (id: string): void => {
      if (done.has(id)) return;
      const start = path.indexOf(id);
      if (start >= 0) {
        const cycle = [...path.slice(start), id].join(' -> ');
        throw new ConfigurationError(`Dependency cycle: ${cycle}`);
      }
      path.push(id);
      for (const parentId of this.resolve(id).parentIds) {
        visit(parentId);
      }
      path.pop();
      done.add(id);
    };

    for (const id of this.registry.keys()) {
      visit(id);
    }
  }
}
