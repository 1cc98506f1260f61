/**
 * Static Call Check
 *
 * Runs over the whole AST before evaluation so that a misspelled
 * function or a malformed argument list fails the compilation before
 * any toolpath is generated.
 */

import { visitNode } from '../../ast/index.js';
import type { FunctionCallNode, ProgramNode } from '../../types.js';
import { GCAD_ERROR_CODES, RuntimeError } from '../../types.js';
import { BUILTINS, BUILTIN_NAMES, isBuiltinName } from '../builtins/index.js';
import { planBinding, type ArgumentSlot } from './callable.js';
import { withSuggestion } from './suggest.js';

/** Argument slots of a call as written, without evaluating anything */
export function argumentSlots(node: FunctionCallNode): ArgumentSlot[] {
  return node.args.map((arg) => ({
    name: arg.type === 'NamedArg' ? arg.name.name : null,
    location: arg.span.start,
  }));
}

function checkCall(node: FunctionCallNode): void {
  const name = node.callee.name;
  if (!isBuiltinName(name)) {
    throw new RuntimeError(
      GCAD_ERROR_CODES.RUNTIME_UNDEFINED_FUNCTION,
      withSuggestion(`Unknown function '${name}'`, name, BUILTIN_NAMES),
      node.callee.span.start,
      { functionName: name }
    );
  }

  planBinding(
    name,
    BUILTINS[name].params,
    argumentSlots(node),
    node.span.start
  );
}

/**
 * Check every call in the program: the target must be a built-in and the
 * arguments must bind to its parameters.
 *
 * @throws RuntimeError RUNTIME_UNDEFINED_FUNCTION or RUNTIME_BINDING_ERROR
 * for the first offending call in source order
 */
export function checkCalls(program: ProgramNode): void {
  visitNode(program, (node) => {
    if (node.type === 'FunctionCall') {
      checkCall(node);
    }
  });
}
