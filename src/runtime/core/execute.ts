/**
 * Program Execution
 *
 * Public API for executing gcad programs.
 * Provides both full execution and step-by-step execution.
 */

import type { ProgramNode } from '../../types.js';
import { Evaluator } from './eval/index.js';
import type {
  ExecutionResult,
  ExecutionStepper,
  RuntimeContext,
  StepResult,
} from './types.js';
import { NULL_VALUE, type GcadValue } from './values.js';

/**
 * Execute a parsed program.
 *
 * @param program The AST (from parse())
 * @param context The runtime context (from createRuntimeContext())
 * @returns The final value, global variables and generated toolpath
 */
export function execute(
  program: ProgramNode,
  context: RuntimeContext
): ExecutionResult {
  const stepper = createStepper(program, context);
  while (!stepper.done) {
    stepper.step();
  }
  return stepper.getResult();
}

/**
 * Create a stepper for controlled step-by-step execution.
 * Allows the caller to inspect machine state and the toolpath between
 * top-level statements.
 */
export function createStepper(
  program: ProgramNode,
  context: RuntimeContext
): ExecutionStepper {
  const statements = program.statements;
  const total = statements.length;
  const evaluator = new Evaluator(context);
  let index = 0;
  let lastValue: GcadValue = NULL_VALUE;
  let isDone = total === 0;

  return {
    get done() {
      return isDone;
    },
    get index() {
      return index;
    },
    get total() {
      return total;
    },
    get context() {
      return context;
    },

    step(): StepResult {
      const stmt = statements[index];
      if (isDone || !stmt) {
        isDone = true;
        return { value: lastValue, done: true, index, total };
      }

      const startTime = Date.now();
      const segmentsBefore = context.toolpath.length;
      context.observability.onStepStart?.({ index, total });

      try {
        lastValue = evaluator.executeStatement(stmt);
      } catch (error) {
        if (error instanceof Error) {
          context.observability.onError?.({ error, index });
        }
        throw error;
      }

      context.observability.onStepEnd?.({
        index,
        total,
        value: lastValue,
        segments: context.toolpath.length - segmentsBefore,
        durationMs: Date.now() - startTime,
      });

      const executed = index;
      index++;
      isDone = index >= total;
      return { value: lastValue, done: isDone, index: executed, total };
    },

    getResult(): ExecutionResult {
      return {
        value: lastValue,
        variables: Object.fromEntries(context.variables),
        segments: context.toolpath.segments,
      };
    },
  };
}
