/**
 * gcad Runtime Tests: Argument Binding
 * Positional and named binding, defaults, kinds and the static call check
 */

import { describe, expect, it } from 'vitest';
import {
  bindArguments,
  checkCalls,
  compile,
  GcadError,
  GCAD_ERROR_CODES,
  length,
  parse,
  string,
  unitless,
  type BuiltinParam,
} from '../src/index.js';
import { createLogCollector, errorOf, testConfig } from './helpers/runtime.js';

function failure(source: string): [string, string] {
  const err = errorOf(source);
  if (!(err instanceof GcadError)) throw err;
  return [err.kind, err.toData().message];
}

function checkFailure(source: string): GcadError {
  try {
    checkCalls(parse(source));
  } catch (err) {
    if (err instanceof GcadError) return err;
    throw err;
  }
  throw new Error('Expected the call check to fail');
}

const PARAMS: BuiltinParam[] = [
  { name: 'a', kind: 'length' },
  { name: 'b', kind: 'unitless', defaultValue: unitless(2) },
  { name: 'c', kind: 'string', optional: true },
];

describe('gcad Runtime: Argument Binding', () => {
  describe('bindArguments', () => {
    it('fills positional slots in declared order', () => {
      const bound = bindArguments('f', PARAMS, [
        { name: null, value: length(1) },
        { name: null, value: unitless(5) },
        { name: null, value: string('s') },
      ]);
      expect(bound.toRecord()).toEqual({
        a: length(1),
        b: unitless(5),
        c: string('s'),
      });
    });

    it('applies defaults and leaves optional parameters unbound', () => {
      const bound = bindArguments('f', PARAMS, [
        { name: 'a', value: length(1) },
      ]);
      expect(bound.unitless('b')).toBe(2);
      expect(bound.has('c')).toBe(false);
    });

    it('fills named slots after positional ones', () => {
      const bound = bindArguments('f', PARAMS, [
        { name: 'c', value: string('late') },
        { name: null, value: length(4) },
      ]);
      expect(bound.length('a')).toBe(4);
      expect(bound.string('c')).toBe('late');
    });

    it('rejects a value of the wrong kind', () => {
      expect(() =>
        bindArguments('f', PARAMS, [{ name: null, value: unitless(1) }])
      ).toThrow("Parameter 'a' of 'f' expects length, got unitless");
    });

    it('checks defaults like supplied values', () => {
      const params: BuiltinParam[] = [
        { name: 'n', kind: 'unitless', defaultValue: length(1) },
      ];
      expect(() => bindArguments('g', params, [])).toThrow(
        "Parameter 'n' of 'g' expects unitless, got length"
      );
    });
  });

  describe('binding errors', () => {
    it('rejects too many positional arguments', () => {
      expect(failure('drill(1mm, 2mm, 3mm, 4, 5);')).toEqual([
        'BindingError',
        "Function 'drill' takes at most 4 positional arguments, got 5",
      ]);
    });

    it('uses the singular for one positional parameter', () => {
      expect(failure("comment('a', 'b');")).toEqual([
        'BindingError',
        "Function 'comment' takes at most 1 positional argument, got 2",
      ]);
    });

    it('rejects an unknown named parameter with a suggestion', () => {
      expect(failure('drill(0mm, 0mm, depht = 1mm);')).toEqual([
        'BindingError',
        "Function 'drill' has no parameter 'depht'; did you mean 'depth'?",
      ]);
    });

    it('rejects a parameter filled positionally and by name', () => {
      expect(failure('drill(0mm, 0mm, 1mm, x = 2mm);')).toEqual([
        'BindingError',
        "Parameter 'x' of 'drill' is supplied more than once",
      ]);
    });

    it('rejects a named parameter given twice', () => {
      expect(failure('drill(x = 0mm, x = 1mm, y = 0mm, depth = 1mm);')).toEqual([
        'BindingError',
        "Parameter 'x' of 'drill' is supplied more than once",
      ]);
    });

    it('rejects a missing required parameter', () => {
      expect(failure('drill(0mm, 0mm);')).toEqual([
        'BindingError',
        "Missing required parameter 'depth' for 'drill'",
      ]);
    });

    it('rejects a unitless depth', () => {
      expect(failure('drill(0mm, 0mm, 5);')).toEqual([
        'TypeError',
        "Parameter 'depth' of 'drill' expects length, got unitless",
      ]);
    });

    it('locates the offending named argument', () => {
      const err = errorOf('drill(0mm, 0mm, bad = 1mm);');
      expect(err instanceof GcadError && err.location).toEqual({
        line: 1,
        column: 17,
        offset: 16,
      });
    });

    it('accepts named arguments in any order', () => {
      const { segments } = compile(
        'groove(depth = 1mm, y2 = 0mm, x2 = 5mm, y1 = 0mm, x1 = 0mm);',
        { config: testConfig() }
      );
      expect(segments.length).toBeGreaterThan(0);
    });
  });

  describe('operation-specific binding rules', () => {
    it('requires exactly one of radius and diameter', () => {
      const message =
        "circle_pocket takes exactly one of 'radius' or 'diameter'";
      expect(
        failure('circle_pocket(0mm, 0mm, 3mm, 1mm, diameter = 6mm);')
      ).toEqual(['BindingError', message]);
      expect(failure('circle_pocket(0mm, 0mm, depth = 1mm);')).toEqual([
        'BindingError',
        message,
      ]);
    });

    it('rejects contour_line with both an endpoint and up', () => {
      expect(
        failure('contour_line(0mm, 0mm, 1mm, 1mm, depth = 1mm, up = 2mm);')
      ).toEqual([
        'BindingError',
        "contour_line takes either 'x2' and 'y2' or 'up', not both",
      ]);
    });

    it('rejects contour_line without an endpoint', () => {
      expect(failure('contour_line(0mm, 0mm, x2 = 1mm, depth = 1mm);')).toEqual([
        'BindingError',
        "contour_line requires 'x2' and 'y2', or 'up'",
      ]);
    });
  });

  describe('static call check', () => {
    it('finds unknown functions inside loop bodies', () => {
      const err = checkFailure(
        'for i in linspace(0, 1, 2) { pockett(1mm); }'
      );
      expect(err.kind).toBe('NameError');
      expect(err.code).toBe(GCAD_ERROR_CODES.RUNTIME_UNDEFINED_FUNCTION);
      expect(err.toData().message).toBe("Unknown function 'pockett'");
      expect(err.location).toEqual({ line: 1, column: 30, offset: 29 });
    });

    it('finds binding errors in calls that never run', () => {
      const err = checkFailure(
        'for i in linspace(0, 1, 0) { drill(i, i, i, i, i); }'
      );
      expect(err.toData().message).toBe(
        "Function 'drill' takes at most 4 positional arguments, got 5"
      );
    });

    it('fails the compilation before anything runs', () => {
      const { logs, callbacks } = createLogCollector();
      expect(() =>
        compile("log('started'); for i in linspace(0, 1, 2) { drill(i); }", {
          config: testConfig(),
          callbacks,
        })
      ).toThrow("Missing required parameter 'y' for 'drill'");
      expect(logs).toEqual([]);
    });

    it('accepts a well-formed program', () => {
      expect(() =>
        checkCalls(parse('drill(0mm, 0mm, depth = 1mm, dwell = 1);'))
      ).not.toThrow();
    });
  });
});
