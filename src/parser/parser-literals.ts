/**
 * Parser Extension: Literal Parsing
 * Strings, integers, decimals and unit numbers
 */

import { Parser } from './parser.js';
import type { SyntaxNode } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { leaf } from './helpers.js';
import { advance, check, expect, makeSpan } from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseString(): SyntaxNode;
    parseNumber(): SyntaxNode;
  }
}

// ============================================================
// LITERAL PARSING
// ============================================================

Parser.prototype.parseString = function (this: Parser): SyntaxNode {
  return leaf('string', expect(this.state, TOKEN_TYPES.STRING));
};

/**
 * integer | decimal | unitNumber
 *
 * The lexer only emits UNIT directly after a NUMBER, so a following
 * UNIT token always belongs to this literal.
 */
Parser.prototype.parseNumber = function (this: Parser): SyntaxNode {
  const token = expect(this.state, TOKEN_TYPES.NUMBER);
  const number = leaf(token.value.includes('.') ? 'decimal' : 'integer', token);

  if (!check(this.state, TOKEN_TYPES.UNIT)) {
    return number;
  }

  const unit = advance(this.state);
  return {
    rule: 'unitNumber',
    span: makeSpan(token.span.start, unit.span.end),
    children: [number],
    token: unit,
  };
};
