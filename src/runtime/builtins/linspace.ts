/**
 * linspace: evenly spaced numbers, both ends included
 */

import type { SourceLocation } from '../../types.js';
import { GCAD_ERROR_CODES, RuntimeError } from '../../types.js';
import type { NumberValue, SequenceValue } from '../core/values.js';
import { inferKind, sequence } from '../core/values.js';

/**
 * @throws RuntimeError RUNTIME_TYPE_ERROR when start and stop differ in
 * kind, RUNTIME_INVALID_OPERATION for a count that is not a positive
 * integer, RUNTIME_LIMIT_EXCEEDED above maxCount
 */
export function linspace(
  start: NumberValue,
  stop: NumberValue,
  count: number,
  maxCount: number,
  location?: SourceLocation
): SequenceValue {
  if (start.unit !== stop.unit) {
    throw new RuntimeError(
      GCAD_ERROR_CODES.RUNTIME_TYPE_ERROR,
      `linspace start and stop must have the same kind, got ${inferKind(start)} and ${inferKind(stop)}`,
      location,
      { start: inferKind(start), stop: inferKind(stop) }
    );
  }
  if (!Number.isInteger(count) || count < 1) {
    throw new RuntimeError(
      GCAD_ERROR_CODES.RUNTIME_INVALID_OPERATION,
      `linspace count must be a positive integer, got ${String(count)}`,
      location,
      { count }
    );
  }
  if (count > maxCount) {
    throw new RuntimeError(
      GCAD_ERROR_CODES.RUNTIME_LIMIT_EXCEEDED,
      `linspace count ${count} exceeds the limit of ${maxCount}`,
      location,
      { count, limit: maxCount }
    );
  }

  if (count === 1) return sequence([start]);

  const step = (stop.value - start.value) / (count - 1);
  const items: NumberValue[] = [];
  for (let i = 0; i < count; i++) {
    const value = i === count - 1 ? stop.value : start.value + step * i;
    items.push({ type: 'number', value, unit: start.unit });
  }
  return sequence(items);
}
