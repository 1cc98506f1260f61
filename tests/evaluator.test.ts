/**
 * gcad Runtime Tests: Evaluator
 * Variables, scoping, for loops, stepping and observability
 */

import { describe, expect, it } from 'vitest';
import {
  createChildContext,
  createRuntimeContext,
  GcadError,
  GCAD_ERROR_CODES,
  getVariable,
  hasVariable,
  length,
  NULL_VALUE,
  unitless,
} from '../src/index.js';
import {
  createEventCollector,
  createLogCollector,
  errorOf,
  run,
  runFull,
  runStepped,
  testConfig,
} from './helpers/runtime.js';

function gcadError(source: string): GcadError {
  const err = errorOf(source);
  if (!(err instanceof GcadError)) throw err;
  return err;
}

describe('gcad Runtime: Evaluator', () => {
  describe('variables', () => {
    it('evaluates expressions over earlier assignments', () => {
      expect(run('x = 2mm; y = x * 3; y;')).toEqual(length(6));
    });

    it('yields the assigned value from an assignment', () => {
      expect(run('x = 4;')).toEqual(unitless(4));
    });

    it('chains assignments', () => {
      const { variables } = runFull('a = b = 7mm;');
      expect(variables).toEqual({ a: length(7), b: length(7) });
    });

    it('rebinds a global variable', () => {
      expect(run('x = 1; x = x + 1; x;')).toEqual(unitless(2));
    });

    it('reads host-provided variables', () => {
      expect(run('w * 2;', { variables: { w: length(3) } })).toEqual(
        length(6)
      );
    });

    it('returns null for an empty program', () => {
      expect(run('')).toEqual(NULL_VALUE);
    });

    it('reports an undefined variable with a suggestion', () => {
      const err = gcadError('depth = 1mm; dept;');
      expect(err.kind).toBe('NameError');
      expect(err.code).toBe(GCAD_ERROR_CODES.RUNTIME_UNDEFINED_VARIABLE);
      expect(err.toData().message).toBe(
        "Undefined variable 'dept'; did you mean 'depth'?"
      );
      expect(err.location).toEqual({ line: 1, column: 14, offset: 13 });
    });

    it('reports an undefined variable without a close match', () => {
      expect(gcadError('zzz;').toData().message).toBe(
        "Undefined variable 'zzz'"
      );
    });
  });

  describe('scopes', () => {
    it('finds host variables from a child scope', () => {
      const ctx = createRuntimeContext({
        config: testConfig(),
        variables: { w: length(3) },
      });
      const child = createChildContext(ctx);

      expect(hasVariable(child, 'w')).toBe(true);
      expect(getVariable(child, 'w')).toEqual(length(3));
      expect(hasVariable(ctx, 'q')).toBe(false);
      expect(getVariable(ctx, 'q')).toBeUndefined();
    });

    it('keeps child bindings out of the parent', () => {
      const ctx = createRuntimeContext({ config: testConfig() });
      const child = createChildContext(ctx);
      child.variables.set('i', unitless(1));

      expect(hasVariable(child, 'i')).toBe(true);
      expect(hasVariable(ctx, 'i')).toBe(false);
    });
  });

  describe('for loops', () => {
    it('runs the body once per item', () => {
      const { logs, callbacks } = createLogCollector();
      run('for i in linspace(1, 3, 3) { log(i); }', { callbacks });
      expect(logs).toEqual([unitless(1), unitless(2), unitless(3)]);
    });

    it('does not leak body variables or the loop variable', () => {
      const { variables } = runFull(
        'for i in linspace(1, 2, 2) { inner = i; }'
      );
      expect(variables).toEqual({});
    });

    it('fails on a body variable read after the loop', () => {
      const err = gcadError('for i in linspace(1, 2, 2) { inner = i; } inner;');
      expect(err.toData().message).toBe("Undefined variable 'inner'");
    });

    it('binds a fresh loop variable every iteration', () => {
      const { logs, callbacks } = createLogCollector();
      run('for i in linspace(1, 3, 3) { log(i); i = 10; log(i); }', {
        callbacks,
      });
      expect(logs).toEqual([
        unitless(1),
        unitless(10),
        unitless(2),
        unitless(10),
        unitless(3),
        unitless(10),
      ]);
    });

    it('reads outer variables from the body', () => {
      const { logs, callbacks } = createLogCollector();
      run('k = 5mm; for i in linspace(1, 2, 2) { log(k * i); }', {
        callbacks,
      });
      expect(logs).toEqual([length(5), length(10)]);
    });

    it('shadows rather than modifies outer variables', () => {
      expect(run('x = 1; for i in linspace(1, 2, 2) { x = i; } x;')).toEqual(
        unitless(1)
      );
    });

    it('gives nested loops their own scopes', () => {
      const { logs, callbacks } = createLogCollector();
      run(
        'for a in linspace(1, 2, 2) { for b in linspace(10, 20, 2) { log(a + b); } }',
        { callbacks }
      );
      expect(logs).toEqual([
        unitless(11),
        unitless(21),
        unitless(12),
        unitless(22),
      ]);
    });

    it('evaluates to null', () => {
      expect(run('for i in linspace(1, 2, 2) { i; }')).toEqual(NULL_VALUE);
    });

    it('rejects a source that is not a sequence', () => {
      const err = gcadError('for i in 3mm { }');
      expect(err.kind).toBe('TypeError');
      expect(err.toData().message).toBe(
        'for loop expects a sequence, got length'
      );
    });
  });

  describe('function calls', () => {
    it('reports an unknown function with a suggestion', () => {
      const err = gcadError('dril(0mm, 0mm, 1mm);');
      expect(err.kind).toBe('NameError');
      expect(err.code).toBe(GCAD_ERROR_CODES.RUNTIME_UNDEFINED_FUNCTION);
      expect(err.toData().message).toBe(
        "Unknown function 'dril'; did you mean 'drill'?"
      );
    });

    it('returns the logged value from log', () => {
      const { logs, callbacks } = createLogCollector();
      expect(run("log('hello');", { callbacks })).toEqual({
        type: 'string',
        value: 'hello',
      });
      expect(logs).toEqual([{ type: 'string', value: 'hello' }]);
    });

    it('stops at the first error', () => {
      const { logs, callbacks } = createLogCollector();
      expect(() =>
        run("log('before'); missing; log('after');", { callbacks })
      ).toThrow("Undefined variable 'missing'");
      expect(logs).toEqual([{ type: 'string', value: 'before' }]);
    });
  });

  describe('stepping', () => {
    it('steps through top-level statements', () => {
      expect(runStepped('a = 1; b = 2;')).toEqual([
        { value: unitless(1), done: false, index: 0, total: 2 },
        { value: unitless(2), done: true, index: 1, total: 2 },
      ]);
    });

    it('counts a whole loop as one step', () => {
      expect(
        runStepped('for i in linspace(1, 3, 3) { i; } x = 1;')
      ).toHaveLength(2);
    });
  });

  describe('observability', () => {
    it('fires step events with index and total', () => {
      const { events, callbacks } = createEventCollector();
      run('a = 1; b = 2;', { observability: callbacks });

      expect(events.stepStart).toEqual([
        { index: 0, total: 2 },
        { index: 1, total: 2 },
      ]);
      expect(events.stepEnd[1]).toMatchObject({
        index: 1,
        total: 2,
        value: unitless(2),
      });
    });

    it('reports segments appended by each step', () => {
      const { events, callbacks } = createEventCollector();
      run("comment('start'); a = 1;", { observability: callbacks });

      expect(events.stepEnd.map((e) => e.segments)).toEqual([1, 0]);
    });

    it('reports host calls with bound arguments and defaults', () => {
      const { events, callbacks } = createEventCollector();
      run('drill(1mm, depth = 2mm, y = 3mm);', { observability: callbacks });

      expect(events.hostCall).toEqual([
        {
          name: 'drill',
          args: {
            x: length(1),
            y: length(3),
            depth: length(2),
            dwell: unitless(0),
          },
        },
      ]);
    });

    it('reports the failing statement index', () => {
      const { events, callbacks } = createEventCollector();
      expect(() =>
        run('a = 1; b = c;', { observability: callbacks })
      ).toThrow(GcadError);

      expect(events.error).toHaveLength(1);
      expect(events.error[0]?.index).toBe(1);
      expect(events.stepEnd).toHaveLength(1);
    });
  });
});
