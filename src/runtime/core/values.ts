/**
 * gcad Value Types and Utilities
 *
 * Values that flow through gcad programs.
 * Public API for host applications.
 */

import type { CanonicalUnit } from '../../units.js';

/** A number; lengths are always stored in canonical units */
export interface NumberValue {
  readonly type: 'number';
  readonly value: number;
  readonly unit: CanonicalUnit | null;
}

export interface StringValue {
  readonly type: 'string';
  readonly value: string;
}

/** Ordered list of values, produced by linspace and iterated by for */
export interface SequenceValue {
  readonly type: 'sequence';
  readonly items: readonly GcadValue[];
}

/** Result of calls made for their side effects */
export interface NullValue {
  readonly type: 'null';
}

/** Any value that can flow through gcad */
export type GcadValue = NumberValue | StringValue | SequenceValue | NullValue;

/** Kinds as reported in type errors and parameter schemas */
export type ValueKind = 'length' | 'unitless' | 'string' | 'sequence' | 'null';

export const NULL_VALUE: NullValue = { type: 'null' };

export function unitless(value: number): NumberValue {
  return { type: 'number', value, unit: null };
}

/** A length in millimeters */
export function length(mm: number): NumberValue {
  return { type: 'number', value: mm, unit: 'mm' };
}

export function string(value: string): StringValue {
  return { type: 'string', value };
}

export function sequence(items: readonly GcadValue[]): SequenceValue {
  return { type: 'sequence', items };
}

/** Infer the kind of a runtime value */
export function inferKind(value: GcadValue): ValueKind {
  switch (value.type) {
    case 'number':
      return value.unit === null ? 'unitless' : 'length';
    case 'string':
      return 'string';
    case 'sequence':
      return 'sequence';
    case 'null':
      return 'null';
  }
}

export function isLength(value: GcadValue): value is NumberValue {
  return value.type === 'number' && value.unit !== null;
}

export function isUnitless(value: GcadValue): value is NumberValue {
  return value.type === 'number' && value.unit === null;
}

/** Format a value for display */
export function formatValue(value: GcadValue): string {
  switch (value.type) {
    case 'number':
      return `${String(value.value)}${value.unit ?? ''}`;
    case 'string':
      return value.value;
    case 'sequence':
      return `[${value.items.map(formatValue).join(', ')}]`;
    case 'null':
      return 'null';
  }
}
