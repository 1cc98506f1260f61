/**
 * gcad Builtin Tests: linspace
 */

import { describe, expect, it } from 'vitest';
import {
  GcadError,
  GCAD_ERROR_CODES,
  length,
  sequence,
  unitless,
  type GcadValue,
} from '../src/index.js';
import { errorOf, run } from './helpers/runtime.js';

function gcadError(source: string): GcadError {
  const err = errorOf(source);
  if (!(err instanceof GcadError)) throw err;
  return err;
}

function numbers(value: GcadValue): number[] {
  if (value.type !== 'sequence') throw new Error(`not a sequence: ${value.type}`);
  return value.items.map((item) => (item.type === 'number' ? item.value : NaN));
}

describe('gcad Builtins: linspace', () => {
  it('includes both ends', () => {
    expect(run('linspace(0mm, 10mm, 5);')).toEqual(
      sequence([length(0), length(2.5), length(5), length(7.5), length(10)])
    );
  });

  it('counts down when stop is below start', () => {
    expect(run('linspace(10, 0, 3);')).toEqual(
      sequence([unitless(10), unitless(5), unitless(0)])
    );
  });

  it('returns only start for a count of one', () => {
    expect(run('linspace(1, 9, 1);')).toEqual(sequence([unitless(1)]));
  });

  it('converts inch endpoints to millimeters', () => {
    expect(run('linspace(0in, 1in, 2);')).toEqual(
      sequence([length(0), length(25.4)])
    );
  });

  it('ends exactly on stop', () => {
    const values = numbers(run('linspace(0, 1, 7);'));
    expect(values).toHaveLength(7);
    expect(values[6]).toBe(1);
    for (let i = 1; i < values.length; i++) {
      expect(values[i]).toBeGreaterThan(values[i - 1] ?? Infinity);
    }
  });

  it('rejects endpoints of different kinds', () => {
    const err = gcadError('linspace(0mm, 10, 3);');
    expect(err.kind).toBe('TypeError');
    expect(err.code).toBe(GCAD_ERROR_CODES.RUNTIME_TYPE_ERROR);
    expect(err.toData().message).toBe(
      'linspace start and stop must have the same kind, got length and unitless'
    );
    expect(err.location).toEqual({ line: 1, column: 1, offset: 0 });
  });

  it('rejects a zero count', () => {
    const err = gcadError('linspace(0, 1, 0);');
    expect(err.code).toBe(GCAD_ERROR_CODES.RUNTIME_INVALID_OPERATION);
    expect(err.toData().message).toBe(
      'linspace count must be a positive integer, got 0'
    );
  });

  it('rejects a fractional count', () => {
    expect(gcadError('linspace(0, 1, 2.5);').toData().message).toBe(
      'linspace count must be a positive integer, got 2.5'
    );
  });

  it('enforces the configured sequence limit', () => {
    const err = gcadError('linspace(0, 1, 1001);');
    expect(err.kind).toBe('RuntimeError');
    expect(err.code).toBe(GCAD_ERROR_CODES.RUNTIME_LIMIT_EXCEEDED);
    expect(err.toData().message).toBe(
      'linspace count 1001 exceeds the limit of 1000'
    );
  });

  it('accepts a count at the limit', () => {
    expect(numbers(run('linspace(0, 999, 1000);'))).toHaveLength(1000);
  });
});
