/**
 * Parser Extension: Expression Parsing
 * Assignment and the operator precedence chain
 *
 * Precedence, loosest first:
 *   additive       + -
 *   multiplicative * /
 *   unary          prefix -
 *   power          ^ (right-associative)
 *   postfix        factorial !
 *   trivial        literal, (expr), call, identifier
 */

import { Parser } from './parser.js';
import type { SyntaxNode } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { branch, isBinding, isFunctionCall, leaf } from './helpers.js';
import {
  advance,
  check,
  expect,
  makeSpan,
  unexpected,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseExpression(): SyntaxNode;
    parseAssignment(): SyntaxNode;
    parseAdditive(): SyntaxNode;
    parseMultiplicative(): SyntaxNode;
    parseUnary(): SyntaxNode;
    parsePower(): SyntaxNode;
    parsePostfix(): SyntaxNode;
    parseTrivial(): SyntaxNode;
    parseGroup(): SyntaxNode;
  }
}

// ============================================================
// EXPRESSION PARSING
// ============================================================

/** expr := assign | mathExpr */
Parser.prototype.parseExpression = function (this: Parser): SyntaxNode {
  if (isBinding(this.state)) {
    return this.parseAssignment();
  }
  return this.parseAdditive();
};

/** assign := ident '=' expr */
Parser.prototype.parseAssignment = function (this: Parser): SyntaxNode {
  const target = leaf('ident', advance(this.state));
  advance(this.state); // consume =
  const value = this.parseExpression();
  return branch('assign', [target, value]);
};

// ============================================================
// BINARY OPERATORS
// ============================================================

Parser.prototype.parseAdditive = function (this: Parser): SyntaxNode {
  const children: SyntaxNode[] = [this.parseMultiplicative()];

  while (check(this.state, TOKEN_TYPES.PLUS, TOKEN_TYPES.MINUS)) {
    children.push(leaf('operator', advance(this.state)));
    children.push(this.parseMultiplicative());
  }

  const [only] = children;
  return children.length === 1 && only ? only : branch('additive', children);
};

Parser.prototype.parseMultiplicative = function (this: Parser): SyntaxNode {
  const children: SyntaxNode[] = [this.parseUnary()];

  while (check(this.state, TOKEN_TYPES.STAR, TOKEN_TYPES.SLASH)) {
    children.push(leaf('operator', advance(this.state)));
    children.push(this.parseUnary());
  }

  const [only] = children;
  return children.length === 1 && only
    ? only
    : branch('multiplicative', children);
};

Parser.prototype.parseUnary = function (this: Parser): SyntaxNode {
  if (check(this.state, TOKEN_TYPES.MINUS)) {
    const op = leaf('operator', advance(this.state));
    const operand = this.parseUnary();
    return branch('unary', [op, operand]);
  }
  return this.parsePower();
};

Parser.prototype.parsePower = function (this: Parser): SyntaxNode {
  const base = this.parsePostfix();

  if (check(this.state, TOKEN_TYPES.CARET)) {
    const op = leaf('operator', advance(this.state));
    // Exponent re-enters at unary: right-associative, allows 2^-1
    const exponent = this.parseUnary();
    return branch('power', [base, op, exponent]);
  }

  return base;
};

Parser.prototype.parsePostfix = function (this: Parser): SyntaxNode {
  const operand = this.parseTrivial();
  const children: SyntaxNode[] = [operand];

  while (check(this.state, TOKEN_TYPES.BANG)) {
    children.push(leaf('operator', advance(this.state)));
  }

  return children.length === 1 ? operand : branch('postfix', children);
};

// ============================================================
// TRIVIAL EXPRESSIONS
// ============================================================

Parser.prototype.parseTrivial = function (this: Parser): SyntaxNode {
  if (check(this.state, TOKEN_TYPES.STRING)) {
    return this.parseString();
  }

  if (check(this.state, TOKEN_TYPES.NUMBER)) {
    return this.parseNumber();
  }

  if (check(this.state, TOKEN_TYPES.LPAREN)) {
    return this.parseGroup();
  }

  if (isFunctionCall(this.state)) {
    return this.parseFunctionCall();
  }

  if (check(this.state, TOKEN_TYPES.IDENTIFIER)) {
    return leaf('ident', advance(this.state));
  }

  throw unexpected(this.state, 'expression');
};

Parser.prototype.parseGroup = function (this: Parser): SyntaxNode {
  const open = expect(this.state, TOKEN_TYPES.LPAREN);
  const inner = this.parseExpression();
  const close = expect(this.state, TOKEN_TYPES.RPAREN);

  return {
    rule: 'group',
    span: makeSpan(open.span.start, close.span.end),
    children: [inner],
  };
};
