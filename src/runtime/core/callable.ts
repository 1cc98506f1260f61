/**
 * Built-in Function Types and Argument Binding
 *
 * Every built-in declares its parameters. A call's arguments are bound
 * to them in two steps: positional arguments fill parameters in declared
 * order, then named arguments fill the remaining ones. A parameter
 * filled twice, an unknown name, surplus positional arguments and a
 * missing required parameter are binding errors; a value of the wrong
 * kind is a type error.
 */

import type { LimitSettings } from '../../config.js';
import type { ToolpathBuffer } from '../../gcode/index.js';
import type { SourceLocation } from '../../types.js';
import { GCAD_ERROR_CODES, RuntimeError } from '../../types.js';
import type { MachineState } from './machine.js';
import { withSuggestion } from './suggest.js';
import type { RuntimeCallbacks } from './types.js';
import type { GcadValue, NumberValue, ValueKind } from './values.js';
import { inferKind, isLength, isUnitless } from './values.js';

// ============================================================
// DEFINITIONS
// ============================================================

/** Accepted value kinds; 'number' takes lengths and unitless numbers */
export type ParamKind = 'length' | 'unitless' | 'number' | 'string' | 'any';

/**
 * Parameter metadata for built-in functions.
 *
 * Parameters with defaultValue or optional are not required. An optional
 * parameter without a default is simply absent when omitted.
 */
export interface BuiltinParam {
  readonly name: string;
  readonly kind: ParamKind;
  readonly defaultValue?: GcadValue | undefined;
  readonly optional?: boolean | undefined;
  readonly description?: string | undefined;
}

/** Compilation state a built-in may read and mutate */
export interface BuiltinContext {
  readonly machine: MachineState;
  readonly toolpath: ToolpathBuffer;
  readonly limits: LimitSettings;
  readonly callbacks: RuntimeCallbacks;
}

export type BuiltinFn = (
  args: BoundArguments,
  ctx: BuiltinContext,
  location?: SourceLocation
) => GcadValue;

export interface BuiltinDefinition {
  readonly params: readonly BuiltinParam[];
  readonly fn: BuiltinFn;
  readonly description: string;
}

// ============================================================
// BINDING
// ============================================================

/** An argument as written at the call site; name is null if positional */
export interface ArgumentSlot {
  readonly name: string | null;
  readonly location?: SourceLocation | undefined;
}

export interface CallArgument extends ArgumentSlot {
  readonly value: GcadValue;
}

function bindingError(
  message: string,
  location: SourceLocation | undefined,
  context: Record<string, unknown>
): RuntimeError {
  return new RuntimeError(
    GCAD_ERROR_CODES.RUNTIME_BINDING_ERROR,
    message,
    location,
    context
  );
}

function isRequired(param: BuiltinParam): boolean {
  return param.defaultValue === undefined && param.optional !== true;
}

/**
 * Assign call-site arguments to parameters without looking at values.
 * Shared by the static call check and runtime binding.
 *
 * @returns The argument bound to each filled parameter, by name
 */
export function planBinding<T extends ArgumentSlot>(
  functionName: string,
  params: readonly BuiltinParam[],
  args: readonly T[],
  location?: SourceLocation
): Map<string, T> {
  const bound = new Map<string, T>();
  const positional = args.filter((arg) => arg.name === null);

  for (const [index, arg] of positional.entries()) {
    const param = params[index];
    if (!param) {
      const max = params.length;
      throw bindingError(
        `Function '${functionName}' takes at most ${max} positional argument${max === 1 ? '' : 's'}, got ${positional.length}`,
        arg.location ?? location,
        { functionName, expectedCount: max, actualCount: positional.length }
      );
    }
    bound.set(param.name, arg);
  }

  for (const arg of args) {
    const name = arg.name;
    if (name === null) continue;

    if (!params.some((param) => param.name === name)) {
      throw bindingError(
        withSuggestion(
          `Function '${functionName}' has no parameter '${name}'`,
          name,
          params.map((param) => param.name)
        ),
        arg.location ?? location,
        { functionName, parameter: name }
      );
    }
    if (bound.has(name)) {
      throw bindingError(
        `Parameter '${name}' of '${functionName}' is supplied more than once`,
        arg.location ?? location,
        { functionName, parameter: name }
      );
    }
    bound.set(name, arg);
  }

  for (const param of params) {
    if (!bound.has(param.name) && isRequired(param)) {
      throw bindingError(
        `Missing required parameter '${param.name}' for '${functionName}'`,
        location,
        { functionName, parameter: param.name }
      );
    }
  }

  return bound;
}

function matchesKind(value: GcadValue, kind: ParamKind): boolean {
  switch (kind) {
    case 'length':
      return isLength(value);
    case 'unitless':
      return isUnitless(value);
    case 'number':
      return value.type === 'number';
    case 'string':
      return value.type === 'string';
    case 'any':
      return true;
  }
}

/**
 * Bind evaluated arguments, apply defaults and check value kinds.
 *
 * @throws RuntimeError RUNTIME_BINDING_ERROR or RUNTIME_TYPE_ERROR
 */
export function bindArguments(
  functionName: string,
  params: readonly BuiltinParam[],
  args: readonly CallArgument[],
  location?: SourceLocation
): BoundArguments {
  const plan = planBinding(functionName, params, args, location);
  const values = new Map<string, GcadValue>();

  for (const param of params) {
    const arg = plan.get(param.name);
    const value = arg?.value ?? param.defaultValue;
    if (value === undefined) continue;

    if (!matchesKind(value, param.kind)) {
      throw new RuntimeError(
        GCAD_ERROR_CODES.RUNTIME_TYPE_ERROR,
        `Parameter '${param.name}' of '${functionName}' expects ${param.kind}, got ${inferKind(value)}`,
        arg?.location ?? location,
        {
          functionName,
          parameter: param.name,
          expected: param.kind,
          actual: inferKind(value),
        }
      );
    }
    values.set(param.name, value);
  }

  return new BoundArguments(functionName, values);
}

// ============================================================
// BOUND ARGUMENTS
// ============================================================

/**
 * Arguments after binding. Accessors assume the kinds bindArguments
 * checked; asking for anything else is a programming error.
 */
export class BoundArguments {
  constructor(
    readonly functionName: string,
    private readonly values: ReadonlyMap<string, GcadValue>
  ) {}

  has(name: string): boolean {
    return this.values.has(name);
  }

  value(name: string): GcadValue {
    const value = this.values.get(name);
    if (value === undefined) {
      throw new Error(
        `Argument '${name}' of '${this.functionName}' is unbound`
      );
    }
    return value;
  }

  number(name: string): NumberValue {
    return this.expect(name, 'number');
  }

  /** Length in mm */
  length(name: string): number {
    return this.expect(name, 'length').value;
  }

  unitless(name: string): number {
    return this.expect(name, 'unitless').value;
  }

  string(name: string): string {
    const value = this.value(name);
    if (value.type !== 'string') throw this.misuse(name, 'string', value);
    return value.value;
  }

  /** Length in mm, or undefined when the optional argument was omitted */
  optionalLength(name: string): number | undefined {
    return this.has(name) ? this.length(name) : undefined;
  }

  toRecord(): Record<string, GcadValue> {
    return Object.fromEntries(this.values);
  }

  private expect(name: string, kind: ValueKind | 'number'): NumberValue {
    const value = this.value(name);
    if (value.type !== 'number') throw this.misuse(name, kind, value);
    if (kind !== 'number' && inferKind(value) !== kind) {
      throw this.misuse(name, kind, value);
    }
    return value;
  }

  private misuse(name: string, kind: string, value: GcadValue): Error {
    return new Error(
      `Argument '${name}' of '${this.functionName}' is ${inferKind(value)}, not ${kind}`
    );
  }
}
