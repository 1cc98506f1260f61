/**
 * Evaluator Extension: Expressions
 * Literals, identifiers, assignment and operators
 */

import { Evaluator } from './evaluator.js';
import type {
  AssignmentNode,
  BinaryExprNode,
  ExpressionNode,
  FactorialExprNode,
  IdentifierNode,
  UnaryExprNode,
} from '../../../types.js';
import { GCAD_ERROR_CODES, RuntimeError } from '../../../types.js';
import * as units from '../../../units.js';
import { getVariable, setVariable, visibleNames } from '../context.js';
import { withSuggestion } from '../suggest.js';
import { inferKind, type GcadValue, type NumberValue } from '../values.js';

// Declaration merging to add methods to Evaluator interface
declare module './evaluator.js' {
  interface Evaluator {
    evaluateExpression(node: ExpressionNode): GcadValue;
    evaluateIdentifier(node: IdentifierNode): GcadValue;
    evaluateAssignment(node: AssignmentNode): GcadValue;
    evaluateBinary(node: BinaryExprNode): GcadValue;
    evaluateUnary(node: UnaryExprNode): GcadValue;
    evaluateFactorial(node: FactorialExprNode): GcadValue;
  }
}

// ============================================================
// HELPERS
// ============================================================

function operandError(
  op: string,
  operands: readonly GcadValue[],
  node: ExpressionNode
): RuntimeError {
  const kinds = operands.map(inferKind);
  return RuntimeError.fromNode(
    GCAD_ERROR_CODES.RUNTIME_TYPE_ERROR,
    `Cannot apply '${op}' to ${kinds.join(' and ')}`,
    node,
    { operator: op, operands: kinds }
  );
}

const BINARY_OPS = {
  '+': units.add,
  '-': units.subtract,
  '*': units.multiply,
  '/': units.divide,
  '^': units.power,
} as const;

// ============================================================
// DISPATCH
// ============================================================

Evaluator.prototype.evaluateExpression = function (
  this: Evaluator,
  node: ExpressionNode
): GcadValue {
  switch (node.type) {
    case 'NumberLiteral':
      return units.quantity(node.value, node.unit);
    case 'StringLiteral':
      return { type: 'string', value: node.value };
    case 'Identifier':
      return this.evaluateIdentifier(node);
    case 'Assignment':
      return this.evaluateAssignment(node);
    case 'BinaryExpr':
      return this.evaluateBinary(node);
    case 'UnaryExpr':
      return this.evaluateUnary(node);
    case 'FactorialExpr':
      return this.evaluateFactorial(node);
    case 'FunctionCall':
      return this.evaluateFunctionCall(node);
  }
};

// ============================================================
// VARIABLES
// ============================================================

Evaluator.prototype.evaluateIdentifier = function (
  this: Evaluator,
  node: IdentifierNode
): GcadValue {
  const value = getVariable(this.ctx, node.name);
  if (value === undefined) {
    throw RuntimeError.fromNode(
      GCAD_ERROR_CODES.RUNTIME_UNDEFINED_VARIABLE,
      withSuggestion(
        `Undefined variable '${node.name}'`,
        node.name,
        visibleNames(this.ctx)
      ),
      node,
      { variable: node.name }
    );
  }
  return value;
};

/** Binds in the innermost scope and yields the assigned value */
Evaluator.prototype.evaluateAssignment = function (
  this: Evaluator,
  node: AssignmentNode
): GcadValue {
  const value = this.evaluateExpression(node.value);
  setVariable(this.ctx, node.target.name, value);
  return value;
};

// ============================================================
// OPERATORS
// ============================================================

Evaluator.prototype.evaluateBinary = function (
  this: Evaluator,
  node: BinaryExprNode
): GcadValue {
  const left = this.evaluateExpression(node.left);
  const right = this.evaluateExpression(node.right);
  if (left.type !== 'number' || right.type !== 'number') {
    throw operandError(node.op, [left, right], node);
  }
  return BINARY_OPS[node.op](left, right, node.span.start);
};

Evaluator.prototype.evaluateUnary = function (
  this: Evaluator,
  node: UnaryExprNode
): GcadValue {
  const operand = this.evaluateExpression(node.operand);
  if (operand.type !== 'number') {
    throw operandError(node.op, [operand], node);
  }
  return units.negate(operand);
};

Evaluator.prototype.evaluateFactorial = function (
  this: Evaluator,
  node: FactorialExprNode
): NumberValue {
  const operand = this.evaluateExpression(node.operand);
  if (operand.type !== 'number') {
    throw operandError('!', [operand], node);
  }
  return units.factorial(operand, node.span.start);
};
