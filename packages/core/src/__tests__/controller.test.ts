/**
 * Controller and update propagation tests
 */

import { describe, it, expect } from 'vitest';
import { Apply } from '../apply.js';
import { ComboBox } from '../comboBox.js';
import { spreadParents, type Control } from '../control.js';
import { Controller } from '../controller.js';
import { ConfigurationError, UnknownControlError, UpdateError } from '../errors.js';
import { FileUpload } from '../fileUpload.js';
import { Slider } from '../slider.js';
import { TextField } from '../textField.js';
import type { InvalidationPolicy, TextFieldView, View } from '../types.js';
import { intValidator } from '../validator.js';

function textView(id: string, data: string | null): TextFieldView {
  return { type: 'TextFieldView', id, enabled: true, label: null, optional: false, data };
}

function applyView(views: readonly View[]): View | undefined {
  return views.find((view) => view.type === 'ApplyView');
}

describe('Controller', () => {
  describe('construction', () => {
    it('should synthesize Apply after a derived control', () => {
      const c1 = new TextField({ id: 'c1', data: '10' });
      const c2 = new TextField({
        id: 'c2',
        depends: c1,
        update: (control, parents) => {
          control.data = String(Number(parents[0].value()) * 2);
        },
      });

      const views = new Controller([c1, c2]).list();

      expect(views).toHaveLength(3);
      expect(views[0]).toMatchObject({ id: 'c1', data: '10' });
      expect(views[1]).toMatchObject({ id: 'c2', data: '20' });
      expect(views[2]).toMatchObject({ type: 'ApplyView', enabled: true });
    });

    it('should not add Apply for finite-state controls only', () => {
      const controller = new Controller([new ComboBox({ data: ['a'] }), new Slider({ data: [1, 2] })]);

      expect(controller.list().map((view) => view.type)).toEqual(['ComboBoxView', 'SliderView']);
    });

    it('should add Apply when any control needs it, wherever it appears', () => {
      const controller = new Controller([new TextField({ id: 't' }), new ComboBox({ data: ['a'] })]);

      expect(controller.list().map((view) => view.type)).toEqual(['TextFieldView', 'ComboBoxView', 'ApplyView']);
    });

    it('should add Apply for a dependent finite-state control', () => {
      const base = new ComboBox({ id: 'base', data: [1, 2] });
      const derived = new ComboBox({ id: 'derived', depends: 'base', data: [3] });

      expect(applyView(new Controller([base, derived]).list())).toBeDefined();
    });

    it('should keep a supplied Apply in place', () => {
      const controller = new Controller([new Apply({ id: 'go', label: 'Run' }), new TextField({ id: 't' })]);

      expect(controller.list().map((view) => view.id)).toEqual(['go', 't']);
    });

    it('should reject a second Apply', () => {
      expect(() => new Controller([new Apply(), new Apply()])).toThrow('Apply must appear only once');
    });

    it('should reject duplicate ids', () => {
      expect(() => new Controller([new TextField({ id: 'x' }), new ComboBox({ id: 'x', data: [] })])).toThrow(
        'Duplicate control id "x"'
      );
    });

    it('should reject dependencies on unregistered controls', () => {
      const orphan = new TextField({ id: 'orphan', depends: 'missing' });

      expect(() => new Controller([orphan])).toThrow('Control "orphan" depends on unregistered control "missing"');
    });

    it('should reject dependency cycles', () => {
      const a = new TextField({ id: 'a', depends: 'b' });
      const b = new TextField({ id: 'b', depends: 'a' });

      expect(() => new Controller([a, b])).toThrow('Dependency cycle: a -> b -> a');
    });

    it('should reject a control depending on itself', () => {
      expect(() => new Controller([new TextField({ id: 'self', depends: 'self' })])).toThrow(ConfigurationError);
    });

    it('should reject unknown parameter ids', () => {
      expect(() => new Controller([new TextField({ id: 'a' })], { parameters: ['b'] })).toThrow(
        'Parameter control "b" is not registered'
      );
    });
  });

  describe('list', () => {
    it('should reject views for unknown controls', () => {
      const controller = new Controller([new TextField({ id: 'a' })]);

      expect(() => controller.list([textView('zzz', '1')])).toThrow(UnknownControlError);
    });

    it('should return the same views when fed its own output', () => {
      const c1 = new TextField({ id: 'c1', data: '3' });
      const c2 = new TextField({
        id: 'c2',
        depends: c1,
        update: (control, parents) => {
          control.data = `${parents[0].value()}!`;
        },
      });
      const controller = new Controller([c1, c2, new ComboBox({ id: 'c3', data: ['x', 'y'] })]);

      const views = controller.list();

      expect(controller.list(views)).toEqual(views);
    });
  });

  describe('update propagation', () => {
    function diamond(invalidation: InvalidationPolicy) {
      const calls = { a: 0, b: 0, c: 0, d: 0 };
      const a = new TextField({
        id: 'a',
        data: 'x',
        update: () => {
          calls.a++;
        },
      });
      const b = new TextField({
        id: 'b',
        depends: a,
        update: (control, [parent]) => {
          calls.b++;
          control.data = `${parent.value()}b`;
        },
      });
      const c = new TextField({
        id: 'c',
        depends: a,
        update: (control, [parent]) => {
          calls.c++;
          control.data = `${parent.value()}c`;
        },
      });
      const d = new TextField({
        id: 'd',
        depends: [b, c],
        update: (control, [left, right]) => {
          calls.d++;
          control.data = `${left.value()}+${right.value()}`;
        },
      });
      const controller = new Controller([a, b, c, d], { invalidation });
      return { calls, controller, d };
    }

    it('should run each update function once across repeated lists', () => {
      const { calls, controller, d } = diamond('self');

      controller.list();
      controller.list();
      controller.list();

      expect(calls).toEqual({ a: 1, b: 1, c: 1, d: 1 });
      expect(d.data).toBe('xb+xc');
    });

    it('should resolve parents before the child', () => {
      const order: string[] = [];
      const root = new TextField({ id: 'root', update: () => void order.push('root') });
      const leaf = new TextField({ id: 'leaf', depends: root, update: () => void order.push('leaf') });

      new Controller([leaf, root]).list();

      expect(order).toEqual(['root', 'leaf']);
    });

    it('should only recompute a re-applied node under the default policy', () => {
      const { calls, controller, d } = diamond('self');
      controller.list();

      controller.list([textView('a', 'y')]);

      expect(calls).toEqual({ a: 2, b: 1, c: 1, d: 1 });
      expect(d.data).toBe('xb+xc');
    });

    it('should recompute descendants under the transitive policy', () => {
      const { calls, controller, d } = diamond('transitive');
      controller.list();

      controller.list([textView('a', 'y')]);

      expect(calls).toEqual({ a: 2, b: 2, c: 2, d: 2 });
      expect(d.data).toBe('yb+yc');
    });

    it('should leave untouched branches alone under the transitive policy', () => {
      const { calls, controller } = diamond('transitive');
      controller.list();

      controller.list([textView('b', 'manual')]);

      expect(calls).toEqual({ a: 1, b: 2, c: 1, d: 2 });
    });

    it('should wrap update failures with the control id and retry them', () => {
      let attempts = 0;
      const broken = new TextField({
        id: 'broken',
        update: () => {
          attempts++;
          throw new Error('boom');
        },
      });
      const controller = new Controller([broken]);

      expect(() => controller.list()).toThrow('Update of control "broken" failed: boom');
      expect(() => controller.list()).toThrow(UpdateError);
      expect(attempts).toBe(2);
    });

    it('should surface a parent failure with the parent id', () => {
      const parent = new TextField({
        id: 'parent',
        update: () => {
          throw new Error('bad parent');
        },
      });
      const child = new TextField({ id: 'child', depends: parent, update: () => {} });
      const controller = new Controller([child, parent]);

      let error: unknown;
      try {
        controller.list();
      } catch (err) {
        error = err;
      }

      expect(error).toBeInstanceOf(UpdateError);
      expect(error).toMatchObject({ controlId: 'parent' });
    });
  });

  describe('Apply gating', () => {
    it('should enable Apply once every required control has a value', () => {
      const controller = new Controller([new TextField({ id: 'a' }), new TextField({ id: 'b' })]);

      expect(applyView(controller.list())?.enabled).toBe(false);
      expect(applyView(controller.list([textView('a', '1')]))?.enabled).toBe(false);
      expect(applyView(controller.list([textView('b', '2')]))?.enabled).toBe(true);
    });

    it('should ignore optional controls', () => {
      const controller = new Controller([new TextField({ id: 'a' }), new TextField({ id: 'b', optional: true })]);

      expect(applyView(controller.list([textView('a', '1')]))?.enabled).toBe(true);
    });
  });

  describe('apply', () => {
    it('should call the function with parameter values in order', () => {
      const x = new TextField({ id: 'x', data: '2', validator: intValidator() });
      const y = new ComboBox({ id: 'y', data: ['left', 'right'], selected: 1 });
      const controller = new Controller([x, y]);

      const result = controller.apply((count: number, side: string) => `${side}:${count * 3}`, [textView('x', '5')]);

      expect(result).toBe('right:15');
    });

    it('should follow an explicit parameter order', () => {
      const controller = new Controller([new TextField({ id: 'a', data: 'A' }), new TextField({ id: 'b', data: 'B' })], {
        parameters: ['b', 'a'],
      });

      expect(controller.parameters).toEqual(['b', 'a']);
      expect(controller.apply((first: string, second: string) => first + second)).toBe('BA');
    });

    it('should reject a function expecting more arguments than controls', () => {
      const controller = new Controller([new TextField({ id: 'a', data: 'A' })]);

      expect(() => controller.apply((a: string, b: string) => a + b)).toThrow(
        'Function expects 2 arguments but the controller provides 1'
      );
    });

    it('should pass null for controls without a value', () => {
      const controller = new Controller([new TextField({ id: 'a' })]);

      expect(controller.apply((value: string | null) => value === null)).toBe(true);
    });
  });

  describe('typed update functions', () => {
    it('should hold every variant as a Control', () => {
      const size = new Slider({ id: 'size', data: [1, 2, 3], selected: 2 });
      const scaled = new TextField<number>({
        id: 'scaled',
        depends: size,
        validator: intValidator(),
        update: (control, [parent]) => {
          control.data = String(Number(parent.value()) * 10);
        },
      });
      const choice = new ComboBox<string>({
        id: 'choice',
        depends: size,
        update: (control, [parent]) => {
          control.data = ['x', 'y', 'z'].slice(0, Number(parent.value()));
        },
      });
      const controls: Control[] = [size, scaled, choice, new FileUpload({ id: 'upload', optional: true })];

      const controller = new Controller(controls);

      expect(controller.list().map((view) => view.type)).toEqual([
        'SliderView',
        'TextFieldView',
        'ComboBoxView',
        'FileUploadView',
        'ApplyView',
      ]);
      expect(controller.get('scaled')?.value()).toBe(30);
      expect(controller.get('choice')?.value()).toBe('x');
    });

    it('should spread parents into separate arguments', () => {
      const width = new TextField({ id: 'width', data: '3' });
      const height = new TextField({ id: 'height', data: '4' });
      const area = new TextField({
        id: 'area',
        depends: [width, height],
        update: spreadParents((control: TextField, w: Control, h: Control) => {
          control.data = String(Number(w.value()) * Number(h.value()));
        }),
      });

      const controller = new Controller([width, height, area]);

      expect(controller.get('area')?.value()).toBe('12');
    });
  });

  it('should look up controls by id', () => {
    const field = new TextField({ id: 'a' });
    const controller = new Controller([field]);

    expect(controller.get('a')).toBe(field);
    expect(controller.get('nope')).toBeUndefined();
    expect(() => controller.resolve('nope')).toThrow('Unknown control: nope');
    expect(controller.controls().map((control) => control.kind)).toEqual(['TextField', 'Apply']);
  });
});
