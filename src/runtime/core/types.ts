/**
 * Runtime Types
 *
 * Public types for runtime configuration and execution results.
 * These types are the primary interface for host applications.
 */

import type { GcadConfig, LimitSettings } from '../../config.js';
import type { ToolpathBuffer, ToolpathSegment } from '../../gcode/index.js';
import type { MachineState } from './machine.js';
import type { GcadValue } from './values.js';

/** I/O callbacks for runtime operations */
export interface RuntimeCallbacks {
  /** Called when log() is invoked */
  onLog: (value: GcadValue) => void;
}

/** Observability callbacks for monitoring execution */
export interface ObservabilityCallbacks {
  /** Called before each top-level statement executes */
  onStepStart?: (event: StepStartEvent) => void;
  /** Called after each top-level statement executes */
  onStepEnd?: (event: StepEndEvent) => void;
  /** Called before a built-in is invoked, with its bound arguments */
  onHostCall?: (event: HostCallEvent) => void;
  /** Called when an error aborts execution */
  onError?: (event: ErrorEvent) => void;
}

/** Event emitted before a statement executes */
export interface StepStartEvent {
  /** Statement index (0-based) */
  index: number;
  /** Total statements */
  total: number;
}

/** Event emitted after a statement executes */
export interface StepEndEvent {
  index: number;
  total: number;
  /** Value produced by the statement */
  value: GcadValue;
  /** Segments appended by the statement */
  segments: number;
  /** Execution time in milliseconds */
  durationMs: number;
}

/** Event emitted before a built-in call */
export interface HostCallEvent {
  name: string;
  args: Readonly<Record<string, GcadValue>>;
}

/** Event emitted on error */
export interface ErrorEvent {
  error: Error;
  /** Statement index where the error occurred (if available) */
  index?: number | undefined;
}

/** One lexical scope plus the compilation-wide state it shares */
export interface RuntimeContext {
  /** Enclosing scope (undefined = global scope) */
  readonly parent?: RuntimeContext | undefined;
  /** Variables bound in this scope */
  readonly variables: Map<string, GcadValue>;
  /** Shared by every scope of one compilation */
  readonly machine: MachineState;
  /** Shared by every scope of one compilation */
  readonly toolpath: ToolpathBuffer;
  readonly limits: LimitSettings;
  readonly callbacks: RuntimeCallbacks;
  readonly observability: ObservabilityCallbacks;
}

/** Options for creating a runtime context */
export interface RuntimeOptions {
  /** Machine settings and materials (default: defaults.yaml) */
  config?: GcadConfig | undefined;
  /** Initial global variables */
  variables?: Record<string, GcadValue> | undefined;
  callbacks?: Partial<RuntimeCallbacks> | undefined;
  observability?: ObservabilityCallbacks | undefined;
}

/** Result of a single step */
export interface StepResult {
  /** Value of the statement just executed */
  value: GcadValue;
  /** True once every statement has run */
  done: boolean;
  /** Index of the statement just executed */
  index: number;
  total: number;
}

/** Controls step-by-step execution of a program */
export interface ExecutionStepper {
  readonly done: boolean;
  /** Index of the next statement */
  readonly index: number;
  readonly total: number;
  readonly context: RuntimeContext;
  /** Execute the next top-level statement */
  step(): StepResult;
  /** Final result; valid once done */
  getResult(): ExecutionResult;
}

/** Result of script execution */
export interface ExecutionResult {
  /** Value of the last top-level statement */
  value: GcadValue;
  /** Global variables after execution */
  variables: Record<string, GcadValue>;
  /** Generated toolpath in program order */
  segments: readonly ToolpathSegment[];
}
