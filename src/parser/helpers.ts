/**
 * Parser Helpers
 * Lookahead predicates and syntax node construction
 * @internal This module contains internal parser utilities
 */

import type { SyntaxNode, SyntaxRule, Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { type ParserState, check, makeSpan, peek } from './state.js';

// ============================================================
// LOOKAHEAD PREDICATES
// ============================================================

/**
 * Check for assignment or named parameter: identifier =
 * @internal
 */
export function isBinding(state: ParserState): boolean {
  return (
    check(state, TOKEN_TYPES.IDENTIFIER) &&
    peek(state, 1).type === TOKEN_TYPES.ASSIGN
  );
}

/**
 * Check for function call: identifier(
 * @internal
 */
export function isFunctionCall(state: ParserState): boolean {
  return (
    check(state, TOKEN_TYPES.IDENTIFIER) &&
    peek(state, 1).type === TOKEN_TYPES.LPAREN
  );
}

/**
 * Check for a token that can begin an expression
 * @internal
 */
export function canStartExpression(state: ParserState): boolean {
  return check(
    state,
    TOKEN_TYPES.NUMBER,
    TOKEN_TYPES.STRING,
    TOKEN_TYPES.IDENTIFIER,
    TOKEN_TYPES.LPAREN,
    TOKEN_TYPES.MINUS
  );
}

// ============================================================
// NODE CONSTRUCTION
// ============================================================

/** @internal */
export function leaf(rule: SyntaxRule, token: Token): SyntaxNode {
  return { rule, span: token.span, children: [], token };
}

/**
 * Build an interior node spanning its first to last child.
 * @internal
 */
export function branch(
  rule: SyntaxRule,
  children: readonly SyntaxNode[]
): SyntaxNode {
  const first = children[0];
  const last = children[children.length - 1];
  if (!first || !last) {
    throw new Error(`Syntax node '${rule}' requires children`);
  }
  return { rule, span: makeSpan(first.span.start, last.span.end), children };
}
