/**
 * Parser Extension: Script Parsing
 * Program, statements, for loops and blocks
 */

import { Parser } from './parser.js';
import type { SyntaxNode } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { leaf } from './helpers.js';
import {
  advance,
  check,
  current,
  expect,
  isAtEnd,
  makeSpan,
  unexpected,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseProgram(): SyntaxNode;
    parseStatement(): SyntaxNode;
    parseForLoop(): SyntaxNode;
    parseBlock(): SyntaxNode;
  }
}

// ============================================================
// PROGRAM PARSING
// ============================================================

Parser.prototype.parseProgram = function (this: Parser): SyntaxNode {
  const start = current(this.state).span.start;
  const statements: SyntaxNode[] = [];

  while (!isAtEnd(this.state)) {
    statements.push(this.parseStatement());
  }

  return {
    rule: 'program',
    span: makeSpan(start, current(this.state).span.end),
    children: statements,
  };
};

// ============================================================
// STATEMENT PARSING
// ============================================================

/** statement := forLoop | expr ';' */
Parser.prototype.parseStatement = function (this: Parser): SyntaxNode {
  if (check(this.state, TOKEN_TYPES.FOR)) {
    return this.parseForLoop();
  }

  const expression = this.parseExpression();
  const semicolon = expect(this.state, TOKEN_TYPES.SEMICOLON, "';'");

  return {
    rule: 'statement',
    span: makeSpan(expression.span.start, semicolon.span.end),
    children: [expression],
  };
};

/** forLoop := 'for' ident 'in' expr block */
Parser.prototype.parseForLoop = function (this: Parser): SyntaxNode {
  const keyword = expect(this.state, TOKEN_TYPES.FOR);
  const variable = leaf(
    'ident',
    expect(this.state, TOKEN_TYPES.IDENTIFIER, 'loop variable name')
  );
  expect(this.state, TOKEN_TYPES.IN);
  const source = this.parseExpression();
  const body = this.parseBlock();

  return {
    rule: 'forLoop',
    span: makeSpan(keyword.span.start, body.span.end),
    children: [variable, source, body],
  };
};

/** block := '{' statement* '}' */
Parser.prototype.parseBlock = function (this: Parser): SyntaxNode {
  const open = expect(this.state, TOKEN_TYPES.LBRACE, "'{' to open block");
  const statements: SyntaxNode[] = [];

  while (!check(this.state, TOKEN_TYPES.RBRACE)) {
    if (isAtEnd(this.state)) {
      throw unexpected(this.state, "statement or '}'");
    }
    statements.push(this.parseStatement());
  }

  const close = advance(this.state);
  return {
    rule: 'block',
    span: makeSpan(open.span.start, close.span.end),
    children: statements,
  };
};
