/**
 * Tokenizer
 * Main tokenization logic
 */

import type { Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { LexerError } from './errors.js';
import { SINGLE_CHAR_OPERATORS } from './operators.js';
import { readIdentifier, readNumber, readString } from './readers.js';
import { isDigit, isIdentifierStart, isWhitespace, Scanner } from './scanner.js';

/** Skip whitespace and // line comments, in any interleaving */
function skipTrivia(scanner: Scanner): void {
  for (;;) {
    scanner.takeWhile(isWhitespace);
    if (scanner.peek() !== '/' || scanner.peek(1) !== '/') return;
    scanner.takeWhile((ch) => ch !== '\n');
  }
}

/** Read the next token(s); a unit number yields two */
export function nextTokens(scanner: Scanner): Token[] {
  skipTrivia(scanner);

  const start = scanner.location();
  if (scanner.atEnd) {
    return [scanner.token(TOKEN_TYPES.EOF, '', start)];
  }

  const ch = scanner.peek();

  if (ch === "'") {
    return [readString(scanner)];
  }

  // Numbers are unsigned; negation is a parser concern
  if (isDigit(ch)) {
    return readNumber(scanner);
  }

  if (isIdentifierStart(ch)) {
    return [readIdentifier(scanner)];
  }

  const singleCharType = SINGLE_CHAR_OPERATORS[ch];
  if (singleCharType) {
    scanner.next();
    return [scanner.token(singleCharType, ch, start)];
  }

  throw new LexerError(`Unexpected character: ${ch}`, start);
}

export function tokenize(source: string): Token[] {
  const scanner = new Scanner(source);
  const tokens: Token[] = [];

  for (;;) {
    const batch = nextTokens(scanner);
    tokens.push(...batch);
    if (batch.some((token) => token.type === TOKEN_TYPES.EOF)) break;
  }

  return tokens;
}
