/**
 * gcad Unit System Tests
 * Canonical conversion and dimension-checked arithmetic
 */

import { describe, expect, it } from 'vitest';
import {
  fromCanonical,
  GcadError,
  LENGTH_UNITS,
  toCanonical,
  type GcadValue,
} from '../src/index.js';
import { add, multiply, quantity } from '../src/units.js';
import { errorOf, run } from './helpers/runtime.js';

function numberOf(value: GcadValue): { value: number; unit: string | null } {
  if (value.type !== 'number') throw new Error(`Expected a number`);
  return { value: value.value, unit: value.unit };
}

/** [kind, message] of the error a program throws */
function failure(source: string): [string, string] {
  const err = errorOf(source);
  if (!(err instanceof GcadError)) throw err;
  return [err.kind, err.toData().message];
}

describe('gcad Units', () => {
  describe('conversion', () => {
    it('converts inches to millimeters', () => {
      expect(toCanonical(2, 'in')).toBe(50.8);
    });

    it('converts feet and yards', () => {
      expect(toCanonical(1, 'ft')).toBe(304.8);
      expect(toCanonical(1, 'yd')).toBe(914.4);
    });

    it('converts millimeters back to centimeters', () => {
      expect(fromCanonical(25, 'cm')).toBe(2.5);
    });

    it('round-trips between every pair of units', () => {
      for (const from of LENGTH_UNITS) {
        for (const to of LENGTH_UNITS) {
          const there = fromCanonical(toCanonical(3.7, from), to);
          expect(fromCanonical(toCanonical(there, to), from)).toBeCloseTo(
            3.7,
            9
          );
        }
      }
    });

    it('normalizes literals on entry', () => {
      expect(quantity(3, 'cm')).toEqual({ type: 'number', value: 30, unit: 'mm' });
      expect(quantity(3, null)).toEqual({ type: 'number', value: 3, unit: null });
    });
  });

  describe('addition and subtraction', () => {
    it('adds lengths written in different units', () => {
      const sum = numberOf(run('1in + 4mm;'));
      expect(sum.unit).toBe('mm');
      expect(sum.value).toBeCloseTo(toCanonical(1, 'in') + 4, 9);
    });

    it('subtracts unitless numbers', () => {
      expect(run('10 - 4;')).toEqual({ type: 'number', value: 6, unit: null });
    });

    it('rejects a unitless number added to a length', () => {
      expect(failure('2mm + 3;')).toEqual([
        'TypeError',
        "Cannot apply '+' to length and unitless",
      ]);
    });

    it('rejects a length subtracted from a unitless number', () => {
      expect(failure('3 - 2mm;')).toEqual([
        'TypeError',
        "Cannot apply '-' to unitless and length",
      ]);
    });
  });

  describe('multiplication and division', () => {
    it('scales a length by a unitless factor on either side', () => {
      expect(run('2 * 3mm;')).toEqual({ type: 'number', value: 6, unit: 'mm' });
      expect(run('3mm * 2;')).toEqual({ type: 'number', value: 6, unit: 'mm' });
    });

    it('rejects length times length', () => {
      expect(failure('2mm * 3mm;')).toEqual([
        'TypeError',
        "Cannot apply '*' to length and length",
      ]);
    });

    it('divides a length by a unitless number', () => {
      expect(run('6mm / 4;')).toEqual({ type: 'number', value: 1.5, unit: 'mm' });
    });

    it('rejects length divided by length', () => {
      expect(failure('6mm / 2mm;')).toEqual([
        'TypeError',
        "Cannot apply '/' to length and length",
      ]);
    });

    it('rejects unitless divided by length', () => {
      expect(failure('6 / 2mm;')).toEqual([
        'TypeError',
        "Cannot apply '/' to unitless and length",
      ]);
    });

    it('rejects division by zero', () => {
      expect(failure('1mm / 0;')).toEqual(['RuntimeError', 'Division by zero']);
    });

    it('checks dimensions when called directly', () => {
      expect(() => multiply(quantity(1, 'mm'), quantity(1, 'in'))).toThrow(
        "Cannot apply '*' to length and length"
      );
      expect(add(quantity(1, null), quantity(2, null)).value).toBe(3);
    });
  });

  describe('power, negation and factorial', () => {
    it('raises unitless numbers', () => {
      expect(run('2^10;')).toEqual({ type: 'number', value: 1024, unit: null });
    });

    it('rejects a length base', () => {
      expect(failure('2mm^2;')).toEqual([
        'TypeError',
        "Cannot apply '^' to length and unitless",
      ]);
    });

    it('rejects an overflowing power', () => {
      expect(failure('10^400;')).toEqual([
        'RuntimeError',
        "Result of '^' is not a finite number",
      ]);
    });

    it('keeps the unit when negating', () => {
      expect(run('-3mm;')).toEqual({ type: 'number', value: -3, unit: 'mm' });
    });

    it('computes factorials', () => {
      expect(run('5!;')).toEqual({ type: 'number', value: 120, unit: null });
      expect(run('0!;')).toEqual({ type: 'number', value: 1, unit: null });
    });

    it('rejects the factorial of a negative number', () => {
      expect(failure('(0 - 3)!;')).toEqual([
        'RuntimeError',
        'Factorial requires a non-negative integer, got -3',
      ]);
    });

    it('rejects the factorial of a fraction', () => {
      expect(failure('2.5!;')).toEqual([
        'RuntimeError',
        'Factorial requires a non-negative integer, got 2.5',
      ]);
    });

    it('rejects the factorial of a length', () => {
      expect(failure('3mm!;')).toEqual([
        'TypeError',
        "Cannot apply '!' to length",
      ]);
    });

    it('rejects a factorial too large to represent', () => {
      expect(failure('171!;')).toEqual([
        'RuntimeError',
        "Result of '!' is not a finite number",
      ]);
    });
  });

  describe('non-numeric operands', () => {
    it('rejects a string operand', () => {
      expect(failure("'a' + 1;")).toEqual([
        'TypeError',
        "Cannot apply '+' to string and unitless",
      ]);
    });

    it('rejects negating a string', () => {
      expect(failure("-'a';")).toEqual([
        'TypeError',
        "Cannot apply '-' to string",
      ]);
    });

    it('rejects arithmetic on a sequence', () => {
      expect(failure('linspace(0, 1, 2) * 2;')).toEqual([
        'TypeError',
        "Cannot apply '*' to sequence and unitless",
      ]);
    });
  });
});
