/**
 * gcad Runtime
 *
 * Public API for executing gcad programs.
 *
 * Module Structure:
 * - core/: Execution engine
 *   - types.ts: Public types (RuntimeContext, RuntimeOptions, etc.)
 *   - values.ts: GcadValue and value constructors
 *   - context.ts: Runtime context and scope chain
 *   - machine.ts: Machine state (tool, material, spindle, scale, position)
 *   - callable.ts: Built-in schemas and argument binding
 *   - check.ts: Static call check
 *   - execute.ts: Program execution (execute, createStepper)
 *   - eval/: AST evaluation (internal)
 * - builtins/: Machining operations and built-in functions
 */

// ============================================================
// PUBLIC TYPES
// ============================================================

export type {
  ErrorEvent,
  ExecutionResult,
  ExecutionStepper,
  HostCallEvent,
  ObservabilityCallbacks,
  RuntimeCallbacks,
  RuntimeContext,
  RuntimeOptions,
  StepEndEvent,
  StepResult,
  StepStartEvent,
} from './core/types.js';

// ============================================================
// VALUES
// ============================================================

export type {
  GcadValue,
  NullValue,
  NumberValue,
  SequenceValue,
  StringValue,
  ValueKind,
} from './core/values.js';
export {
  formatValue,
  inferKind,
  isLength,
  isUnitless,
  length,
  NULL_VALUE,
  sequence,
  string,
  unitless,
} from './core/values.js';

// ============================================================
// BUILT-INS AND BINDING
// ============================================================

export type {
  BuiltinContext,
  BuiltinDefinition,
  BuiltinFn,
  BuiltinParam,
  CallArgument,
  ParamKind,
} from './core/callable.js';
export { bindArguments, BoundArguments } from './core/callable.js';
export {
  BUILTIN_NAMES,
  BUILTINS,
  isBuiltinName,
  type BuiltinName,
} from './builtins/index.js';

// ============================================================
// CONTEXT AND EXECUTION
// ============================================================

export type { MachineState, Position, Scale } from './core/machine.js';
export { createMachineState } from './core/machine.js';
export {
  createChildContext,
  createRuntimeContext,
  getVariable,
  hasVariable,
} from './core/context.js';
export { checkCalls } from './core/check.js';
export { createStepper, execute } from './core/execute.js';
