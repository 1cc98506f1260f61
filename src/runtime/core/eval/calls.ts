/**
 * Evaluator Extension: Function Calls
 * Argument evaluation, binding and built-in dispatch
 */

import { Evaluator } from './evaluator.js';
import type { FunctionCallNode } from '../../../types.js';
import { GCAD_ERROR_CODES, RuntimeError } from '../../../types.js';
import {
  BUILTINS,
  BUILTIN_NAMES,
  isBuiltinName,
} from '../../builtins/index.js';
import { bindArguments, type CallArgument } from '../callable.js';
import { withSuggestion } from '../suggest.js';
import type { GcadValue } from '../values.js';

// Declaration merging to add methods to Evaluator interface
declare module './evaluator.js' {
  interface Evaluator {
    evaluateFunctionCall(node: FunctionCallNode): GcadValue;
  }
}

/**
 * Arguments are evaluated left to right, bound to the built-in's
 * parameters, then passed with the shared machine state.
 */
Evaluator.prototype.evaluateFunctionCall = function (
  this: Evaluator,
  node: FunctionCallNode
): GcadValue {
  const name = node.callee.name;
  if (!isBuiltinName(name)) {
    throw RuntimeError.fromNode(
      GCAD_ERROR_CODES.RUNTIME_UNDEFINED_FUNCTION,
      withSuggestion(`Unknown function '${name}'`, name, BUILTIN_NAMES),
      node.callee,
      { functionName: name }
    );
  }

  const definition = BUILTINS[name];
  const args: CallArgument[] = node.args.map((arg) =>
    arg.type === 'NamedArg'
      ? {
          name: arg.name.name,
          value: this.evaluateExpression(arg.value),
          location: arg.span.start,
        }
      : {
          name: null,
          value: this.evaluateExpression(arg),
          location: arg.span.start,
        }
  );

  const bound = bindArguments(
    name,
    definition.params,
    args,
    node.span.start
  );
  this.ctx.observability.onHostCall?.({ name, args: bound.toRecord() });

  return definition.fn(bound, this.ctx, node.span.start);
};
