/**
 * Unit System
 *
 * Length quantities are normalized to millimeters on entry. Arithmetic
 * is dimension-checked: a length combines with a unitless scale factor,
 * never with another length multiplicatively.
 */

import type { NumberValue } from './runtime/core/values.js';
import type { LengthUnit, SourceLocation } from './types.js';
import { GCAD_ERROR_CODES, RuntimeError } from './types.js';

export const CANONICAL_UNIT = 'mm' as const;
export type CanonicalUnit = typeof CANONICAL_UNIT;

/** Millimeters per unit */
export const UNIT_FACTORS: Readonly<Record<LengthUnit, number>> = {
  mm: 1,
  cm: 10,
  m: 1000,
  in: 25.4,
  ft: 304.8,
  yd: 914.4,
};

export function toCanonical(value: number, unit: LengthUnit): number {
  return value * UNIT_FACTORS[unit];
}

export function fromCanonical(value: number, unit: LengthUnit): number {
  return value / UNIT_FACTORS[unit];
}

/** Number value for a literal as written, e.g. `2in` or `3` */
export function quantity(value: number, unit: LengthUnit | null): NumberValue {
  return unit === null
    ? { type: 'number', value, unit: null }
    : { type: 'number', value: toCanonical(value, unit), unit: CANONICAL_UNIT };
}

// ============================================================
// CHECKED ARITHMETIC
// ============================================================

function dimension(operand: NumberValue): string {
  return operand.unit === null ? 'unitless' : 'length';
}

function mismatch(
  op: string,
  left: NumberValue,
  right: NumberValue,
  location?: SourceLocation
): RuntimeError {
  return new RuntimeError(
    GCAD_ERROR_CODES.RUNTIME_TYPE_ERROR,
    `Cannot apply '${op}' to ${dimension(left)} and ${dimension(right)}`,
    location,
    { operator: op, left: dimension(left), right: dimension(right) }
  );
}

function checked(
  op: string,
  value: number,
  unit: CanonicalUnit | null,
  location?: SourceLocation
): NumberValue {
  if (!Number.isFinite(value)) {
    throw new RuntimeError(
      GCAD_ERROR_CODES.RUNTIME_INVALID_OPERATION,
      `Result of '${op}' is not a finite number`,
      location,
      { operator: op }
    );
  }
  return { type: 'number', value, unit };
}

export function add(
  left: NumberValue,
  right: NumberValue,
  location?: SourceLocation
): NumberValue {
  if (left.unit !== right.unit) throw mismatch('+', left, right, location);
  return checked('+', left.value + right.value, left.unit, location);
}

export function subtract(
  left: NumberValue,
  right: NumberValue,
  location?: SourceLocation
): NumberValue {
  if (left.unit !== right.unit) throw mismatch('-', left, right, location);
  return checked('-', left.value - right.value, left.unit, location);
}

/** length × length has no representable unit and is rejected */
export function multiply(
  left: NumberValue,
  right: NumberValue,
  location?: SourceLocation
): NumberValue {
  if (left.unit !== null && right.unit !== null) {
    throw mismatch('*', left, right, location);
  }
  return checked(
    '*',
    left.value * right.value,
    left.unit ?? right.unit,
    location
  );
}

/** Only a unitless divisor is accepted */
export function divide(
  left: NumberValue,
  right: NumberValue,
  location?: SourceLocation
): NumberValue {
  if (right.unit !== null) throw mismatch('/', left, right, location);
  if (right.value === 0) {
    throw new RuntimeError(
      GCAD_ERROR_CODES.RUNTIME_INVALID_OPERATION,
      'Division by zero',
      location
    );
  }
  return checked('/', left.value / right.value, left.unit, location);
}

export function power(
  base: NumberValue,
  exponent: NumberValue,
  location?: SourceLocation
): NumberValue {
  if (base.unit !== null || exponent.unit !== null) {
    throw mismatch('^', base, exponent, location);
  }
  return checked('^', base.value ** exponent.value, null, location);
}

export function negate(operand: NumberValue): NumberValue {
  return { type: 'number', value: -operand.value, unit: operand.unit };
}

export function factorial(
  operand: NumberValue,
  location?: SourceLocation
): NumberValue {
  if (operand.unit !== null) {
    throw new RuntimeError(
      GCAD_ERROR_CODES.RUNTIME_TYPE_ERROR,
      "Cannot apply '!' to length",
      location,
      { operator: '!', operand: 'length' }
    );
  }
  const n = operand.value;
  if (!Number.isInteger(n) || n < 0) {
    throw new RuntimeError(
      GCAD_ERROR_CODES.RUNTIME_INVALID_OPERATION,
      `Factorial requires a non-negative integer, got ${String(n)}`,
      location,
      { operand: n }
    );
  }

  let result = 1;
  // Stops once the product overflows; checked() reports it
  for (let i = 2; i <= n && Number.isFinite(result); i++) {
    result *= i;
  }
  return checked('!', result, null, location);
}
