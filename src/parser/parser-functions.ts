/**
 * Parser Extension: Function Parsing
 * Function calls with positional and named parameters
 */

import { Parser } from './parser.js';
import type { SyntaxNode } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { branch, canStartExpression, isBinding, leaf } from './helpers.js';
import { advance, check, expect, makeSpan, unexpected } from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseFunctionCall(): SyntaxNode;
    parseParams(): SyntaxNode;
    parseParam(): SyntaxNode;
  }
}

// ============================================================
// FUNCTION CALL PARSING
// ============================================================

/** funcCall := ident '(' params ')' */
Parser.prototype.parseFunctionCall = function (this: Parser): SyntaxNode {
  const name = leaf(
    'ident',
    expect(this.state, TOKEN_TYPES.IDENTIFIER, 'function name')
  );
  const params = this.parseParams();

  return {
    rule: 'funcCall',
    span: makeSpan(name.span.start, params.span.end),
    children: [name, params],
  };
};

/** params := '(' (param (',' param)*)? ')' */
Parser.prototype.parseParams = function (this: Parser): SyntaxNode {
  const open = expect(this.state, TOKEN_TYPES.LPAREN);
  const params: SyntaxNode[] = [];

  if (!check(this.state, TOKEN_TYPES.RPAREN)) {
    params.push(this.parseParam());
    while (check(this.state, TOKEN_TYPES.COMMA)) {
      advance(this.state);
      params.push(this.parseParam());
    }
  }

  const close = expect(this.state, TOKEN_TYPES.RPAREN, "',' or ')'");
  return {
    rule: 'params',
    span: makeSpan(open.span.start, close.span.end),
    children: params,
  };
};

/** param := ident '=' expr | expr */
Parser.prototype.parseParam = function (this: Parser): SyntaxNode {
  if (isBinding(this.state)) {
    const name = leaf('ident', advance(this.state));
    advance(this.state); // consume =
    return branch('namedParam', [name, this.parseExpression()]);
  }

  if (!canStartExpression(this.state)) {
    throw unexpected(this.state, 'parameter');
  }

  return branch('positionalParam', [this.parseExpression()]);
};
