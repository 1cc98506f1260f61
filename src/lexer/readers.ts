/**
 * Token Readers
 * Functions to read specific token types from source
 */

import type { Token } from '../types.js';
import { GCAD_ERROR_CODES, TOKEN_TYPES, isLengthUnit } from '../types.js';
import { LexerError } from './errors.js';
import { KEYWORDS } from './operators.js';
import {
  isDigit,
  isIdentifierChar,
  isIdentifierStart,
  type Scanner,
} from './scanner.js';

/**
 * Read a single-quoted string. A doubled quote ('') stands for one
 * literal quote; there are no other escapes.
 */
export function readString(scanner: Scanner): Token {
  const start = scanner.location();
  scanner.next(); // consume opening '

  let value = '';
  for (;;) {
    if (scanner.atEnd) {
      throw new LexerError(
        'Unterminated string literal',
        start,
        GCAD_ERROR_CODES.LEXER_UNTERMINATED_STRING
      );
    }
    if (scanner.peek() === "'") {
      scanner.next();
      if (scanner.peek() !== "'") break;
    }
    value += scanner.next();
  }

  return scanner.token(TOKEN_TYPES.STRING, value, start);
}

/**
 * Read an integer or decimal. A unit suffix written directly after the
 * digits becomes a separate UNIT token that starts where the number ends.
 */
export function readNumber(scanner: Scanner): Token[] {
  const start = scanner.location();
  let value = scanner.takeWhile(isDigit);

  if (scanner.peek() === '.' && isDigit(scanner.peek(1))) {
    value += scanner.next();
    value += scanner.takeWhile(isDigit);
  }

  const number = scanner.token(TOKEN_TYPES.NUMBER, value, start);
  if (!isIdentifierStart(scanner.peek())) {
    return [number];
  }

  const unitStart = scanner.location();
  const suffix = scanner.takeWhile(isIdentifierChar);
  if (!isLengthUnit(suffix)) {
    throw new LexerError(
      `Unknown unit suffix '${suffix}' (expected mm, cm, m, in, ft or yd)`,
      unitStart,
      GCAD_ERROR_CODES.LEXER_INVALID_UNIT,
      { suffix }
    );
  }

  return [number, scanner.token(TOKEN_TYPES.UNIT, suffix, unitStart)];
}

export function readIdentifier(scanner: Scanner): Token {
  const start = scanner.location();
  const value = scanner.takeWhile(isIdentifierChar);
  const type = KEYWORDS[value] ?? TOKEN_TYPES.IDENTIFIER;
  return scanner.token(type, value, start);
}
