/**
 * Parser State
 * Core state management and token navigation utilities
 */

import type { SourceLocation, SourceSpan, Token, TokenType } from '../types.js';
import { ParseError, TOKEN_DESCRIPTIONS, TOKEN_TYPES } from '../types.js';

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  readonly tokens: readonly Token[];
  pos: number;
}

export function createParserState(tokens: readonly Token[]): ParserState {
  return { tokens, pos: 0 };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** @internal */
export function current(state: ParserState): Token {
  const token = state.tokens[state.pos];
  if (token) return token;
  const last = state.tokens[state.tokens.length - 1];
  if (last) return last;
  throw new Error('No tokens available');
}

/** @internal */
export function peek(state: ParserState, offset = 0): Token {
  const token = state.tokens[state.pos + offset];
  if (token) return token;
  const last = state.tokens[state.tokens.length - 1];
  if (last) return last;
  throw new Error('No tokens available');
}

/** @internal */
export function isAtEnd(state: ParserState): boolean {
  return current(state).type === TOKEN_TYPES.EOF;
}

/** @internal */
export function check(state: ParserState, ...types: TokenType[]): boolean {
  return types.includes(current(state).type);
}

/** @internal */
export function advance(state: ParserState): Token {
  const token = current(state);
  if (!isAtEnd(state)) state.pos++;
  return token;
}

/**
 * Consume a token of the given type or fail with a ParseError naming
 * the expected construct.
 * @internal
 */
export function expect(
  state: ParserState,
  type: TokenType,
  expected: string = TOKEN_DESCRIPTIONS[type]
): Token {
  if (check(state, type)) return advance(state);
  throw unexpected(state, expected);
}

/**
 * Build the ParseError for the current token.
 * @internal
 */
export function unexpected(state: ParserState, expected: string): ParseError {
  const token = current(state);
  const found = describeToken(token);
  const hint = generateHint(expected, token);
  const message = `Expected ${expected}, got ${found}`;
  return new ParseError(
    hint ? `${message}. ${hint}` : message,
    token.span.start,
    { expected, found }
  );
}

function describeToken(token: Token): string {
  if (token.type === TOKEN_TYPES.EOF) return TOKEN_DESCRIPTIONS.EOF;
  return `'${token.value}'`;
}

// ============================================================
// ERROR HINTS
// ============================================================

/**
 * Generate contextual hints for common parse errors.
 * @internal
 */
function generateHint(expected: string, actual: Token): string | null {
  if (actual.type === TOKEN_TYPES.EOF) {
    if (expected.includes(TOKEN_DESCRIPTIONS.RPAREN)) {
      return 'Hint: Check for unclosed parenthesis';
    }
    if (expected.includes(TOKEN_DESCRIPTIONS.RBRACE)) {
      return 'Hint: Check for unclosed brace';
    }
  }

  if (
    expected.includes(TOKEN_DESCRIPTIONS.SEMICOLON) &&
    actual.type === TOKEN_TYPES.IDENTIFIER
  ) {
    return "Hint: Statements end with ';'";
  }

  return null;
}

// ============================================================
// SPAN UTILITIES
// ============================================================

/** @internal */
export function makeSpan(
  start: SourceLocation,
  end: SourceLocation
): SourceSpan {
  return { start, end };
}
