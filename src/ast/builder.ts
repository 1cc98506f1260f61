/**
 * AST Builder
 * Lowers the concrete syntax tree into typed AST nodes.
 *
 * Precedence is already encoded by the nesting of grammar rules; the
 * builder only folds each operator chain into a left-leaning tree.
 */

import type {
  BinaryOp,
  BlockNode,
  ExpressionNode,
  ForLoopNode,
  FunctionCallNode,
  IdentifierNode,
  NamedArgNode,
  ProgramNode,
  SourceSpan,
  StatementLike,
  SyntaxNode,
  SyntaxRule,
  Token,
} from '../types.js';
import { GCAD_ERROR_CODES, ParseError, isLengthUnit } from '../types.js';

// ============================================================
// ERRORS
// ============================================================

function malformed(node: SyntaxNode, reason: string): ParseError {
  return new ParseError(
    `Malformed '${node.rule}' node: ${reason}`,
    node.span.start,
    { rule: node.rule },
    GCAD_ERROR_CODES.PARSE_MALFORMED_TREE
  );
}

function child(node: SyntaxNode, index: number): SyntaxNode {
  const found = node.children[index];
  if (!found) throw malformed(node, `missing child ${index}`);
  return found;
}

function tokenOf(node: SyntaxNode): Token {
  if (!node.token) throw malformed(node, 'leaf without token');
  return node.token;
}

function expectRule(node: SyntaxNode, rule: SyntaxRule): void {
  if (node.rule !== rule) {
    throw malformed(node, `expected '${rule}'`);
  }
}

function spanOf(start: SourceSpan, end: SourceSpan): SourceSpan {
  return { start: start.start, end: end.end };
}

// ============================================================
// STATEMENTS
// ============================================================

/**
 * Build the AST for a parsed program.
 *
 * Throws ParseError with PARSE_MALFORMED_TREE when the tree does not have
 * the shape the parser produces.
 */
export function buildAst(cst: SyntaxNode): ProgramNode {
  expectRule(cst, 'program');
  return {
    type: 'Program',
    span: cst.span,
    statements: cst.children.map(buildStatement),
  };
}

function buildStatement(node: SyntaxNode): StatementLike {
  switch (node.rule) {
    case 'statement':
      return {
        type: 'Statement',
        span: node.span,
        expression: buildExpression(child(node, 0)),
      };
    case 'forLoop':
      return buildForLoop(node);
    default:
      throw malformed(node, 'expected statement');
  }
}

function buildForLoop(node: SyntaxNode): ForLoopNode {
  return {
    type: 'ForLoop',
    span: node.span,
    variable: buildIdentifier(child(node, 0)),
    source: buildExpression(child(node, 1)),
    body: buildBlock(child(node, 2)),
  };
}

function buildBlock(node: SyntaxNode): BlockNode {
  expectRule(node, 'block');
  return {
    type: 'Block',
    span: node.span,
    statements: node.children.map(buildStatement),
  };
}

// ============================================================
// EXPRESSIONS
// ============================================================

function buildExpression(node: SyntaxNode): ExpressionNode {
  switch (node.rule) {
    case 'assign':
      return {
        type: 'Assignment',
        span: node.span,
        target: buildIdentifier(child(node, 0)),
        value: buildExpression(child(node, 1)),
      };
    case 'additive':
    case 'multiplicative':
      return foldChain(node);
    case 'unary':
      return buildUnary(node);
    case 'power':
      return {
        type: 'BinaryExpr',
        span: node.span,
        op: binaryOp(child(node, 1)),
        left: buildExpression(child(node, 0)),
        right: buildExpression(child(node, 2)),
      };
    case 'postfix':
      return buildPostfix(node);
    case 'group':
      return buildExpression(child(node, 0));
    case 'funcCall':
      return buildFunctionCall(node);
    case 'ident':
      return buildIdentifier(node);
    case 'string':
      return {
        type: 'StringLiteral',
        span: node.span,
        value: tokenOf(node).value,
      };
    case 'integer':
    case 'decimal':
      return {
        type: 'NumberLiteral',
        span: node.span,
        value: numberOf(node),
        unit: null,
      };
    case 'unitNumber':
      return buildUnitNumber(node);
    default:
      throw malformed(node, 'expected expression');
  }
}

/** operand (op operand)* folded left: a - b - c is (a - b) - c */
function foldChain(node: SyntaxNode): ExpressionNode {
  const { children } = node;
  if (children.length < 3 || children.length % 2 === 0) {
    throw malformed(node, 'operator chain must alternate operands');
  }

  let left = buildExpression(child(node, 0));
  for (let i = 1; i < children.length; i += 2) {
    const right = buildExpression(child(node, i + 1));
    left = {
      type: 'BinaryExpr',
      span: spanOf(left.span, right.span),
      op: binaryOp(child(node, i)),
      left,
      right,
    };
  }
  return left;
}

function buildUnary(node: SyntaxNode): ExpressionNode {
  const op = tokenOf(child(node, 0)).value;
  if (op !== '-') throw malformed(node, `unknown prefix operator '${op}'`);
  return {
    type: 'UnaryExpr',
    span: node.span,
    op,
    operand: buildExpression(child(node, 1)),
  };
}

function buildPostfix(node: SyntaxNode): ExpressionNode {
  let operand = buildExpression(child(node, 0));
  for (const bang of node.children.slice(1)) {
    if (tokenOf(bang).value !== '!') {
      throw malformed(bang, 'expected factorial operator');
    }
    operand = {
      type: 'FactorialExpr',
      span: spanOf(operand.span, bang.span),
      operand,
    };
  }
  return operand;
}

function buildFunctionCall(node: SyntaxNode): FunctionCallNode {
  const params = child(node, 1);
  expectRule(params, 'params');

  return {
    type: 'FunctionCall',
    span: node.span,
    callee: buildIdentifier(child(node, 0)),
    args: params.children.map(buildArgument),
  };
}

function buildArgument(node: SyntaxNode): ExpressionNode | NamedArgNode {
  switch (node.rule) {
    case 'positionalParam':
      return buildExpression(child(node, 0));
    case 'namedParam':
      return {
        type: 'NamedArg',
        span: node.span,
        name: buildIdentifier(child(node, 0)),
        value: buildExpression(child(node, 1)),
      };
    default:
      throw malformed(node, 'expected parameter');
  }
}

// ============================================================
// LEAVES
// ============================================================

function buildIdentifier(node: SyntaxNode): IdentifierNode {
  expectRule(node, 'ident');
  return { type: 'Identifier', span: node.span, name: tokenOf(node).value };
}

function buildUnitNumber(node: SyntaxNode): ExpressionNode {
  const unit = tokenOf(node).value;
  if (!isLengthUnit(unit)) throw malformed(node, `unknown unit '${unit}'`);
  return {
    type: 'NumberLiteral',
    span: node.span,
    value: numberOf(child(node, 0)),
    unit,
  };
}

function numberOf(node: SyntaxNode): number {
  const value = Number(tokenOf(node).value);
  if (!Number.isFinite(value)) throw malformed(node, 'not a finite number');
  return value;
}

function binaryOp(node: SyntaxNode): BinaryOp {
  const op = tokenOf(node).value;
  switch (op) {
    case '+':
    case '-':
    case '*':
    case '/':
    case '^':
      return op;
    default:
      throw malformed(node, `unknown operator '${op}'`);
  }
}
