/**
 * Evaluator Extension: Statements
 * Statements, for loops and blocks
 */

import { Evaluator } from './evaluator.js';
import type {
  BlockNode,
  ForLoopNode,
  StatementLike,
} from '../../../types.js';
import { GCAD_ERROR_CODES, RuntimeError } from '../../../types.js';
import { createChildContext, setVariable } from '../context.js';
import { inferKind, NULL_VALUE, type GcadValue } from '../values.js';

// Declaration merging to add methods to Evaluator interface
declare module './evaluator.js' {
  interface Evaluator {
    executeStatement(stmt: StatementLike): GcadValue;
    executeForLoop(node: ForLoopNode): GcadValue;
    executeBlock(node: BlockNode): GcadValue;
  }
}

Evaluator.prototype.executeStatement = function (
  this: Evaluator,
  stmt: StatementLike
): GcadValue {
  switch (stmt.type) {
    case 'Statement':
      return this.evaluateExpression(stmt.expression);
    case 'ForLoop':
      return this.executeForLoop(stmt);
  }
};

/**
 * Each item runs the body in a fresh child scope holding only the loop
 * variable, so nothing assigned in the body survives the iteration.
 */
Evaluator.prototype.executeForLoop = function (
  this: Evaluator,
  node: ForLoopNode
): GcadValue {
  const source = this.evaluateExpression(node.source);
  if (source.type !== 'sequence') {
    throw RuntimeError.fromNode(
      GCAD_ERROR_CODES.RUNTIME_TYPE_ERROR,
      `for loop expects a sequence, got ${inferKind(source)}`,
      node.source,
      { actual: inferKind(source) }
    );
  }

  const outer = this.ctx;
  for (const item of source.items) {
    const scope = createChildContext(outer);
    setVariable(scope, node.variable.name, item);
    this.inScope(scope, () => this.executeBlock(node.body));
  }

  return NULL_VALUE;
};

/** Runs in the current scope; the enclosing loop owns the scope */
Evaluator.prototype.executeBlock = function (
  this: Evaluator,
  node: BlockNode
): GcadValue {
  let value: GcadValue = NULL_VALUE;
  for (const stmt of node.statements) {
    value = this.executeStatement(stmt);
  }
  return value;
};
