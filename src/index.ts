/**
 * gcad Module
 * Exports lexer, parser, runtime, emitter and the compile pipeline
 */

export { LexerError, tokenize } from './lexer/index.js';
export { parse, parseSyntax } from './parser/index.js';
export { buildAst, visitNode } from './ast/index.js';
export {
  bindArguments,
  BoundArguments,
  BUILTIN_NAMES,
  BUILTINS,
  type BuiltinContext,
  type BuiltinDefinition,
  type BuiltinFn,
  type BuiltinName,
  type BuiltinParam,
  type CallArgument,
  checkCalls,
  createChildContext,
  createMachineState,
  createRuntimeContext,
  createStepper,
  type ErrorEvent,
  execute,
  type ExecutionResult,
  type ExecutionStepper,
  formatValue,
  type GcadValue,
  getVariable,
  hasVariable,
  type HostCallEvent,
  inferKind,
  isBuiltinName,
  isLength,
  isUnitless,
  length,
  type MachineState,
  NULL_VALUE,
  type NullValue,
  type NumberValue,
  type ObservabilityCallbacks,
  type ParamKind,
  type Position,
  type RuntimeCallbacks,
  type RuntimeContext,
  type RuntimeOptions,
  type Scale,
  sequence,
  type SequenceValue,
  type StepEndEvent,
  type StepResult,
  type StepStartEvent,
  string,
  type StringValue,
  unitless,
  type ValueKind,
} from './runtime/index.js';
export {
  CANONICAL_UNIT,
  fromCanonical,
  toCanonical,
  UNIT_FACTORS,
} from './units.js';
export * from './gcode/index.js';
export {
  loadConfig,
  loadDefaultConfig,
  mergeConfig,
  parseConfig,
  validateConfig,
  type ConfigOverrides,
  type DefaultSettings,
  type GcadConfig,
  type LimitSettings,
  type MachineSettings,
  type MaterialProfile,
} from './config.js';
export {
  compile,
  type CompileOptions,
  type CompileResult,
} from './compile.js';

// ============================================================
// AST AND ERRORS
// ============================================================
export * from './types.js';
