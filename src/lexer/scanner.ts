/**
 * Source Scanner
 * Character cursor over the program text with line/column tracking
 */

import type { SourceLocation, Token, TokenType } from '../types.js';

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

export function isIdentifierStart(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || ch === '_';
}

export function isIdentifierChar(ch: string): boolean {
  return isIdentifierStart(ch) || isDigit(ch);
}

/** Space, tab, CR and LF are all insignificant */
export function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n';
}

export class Scanner {
  private pos = 0;
  private line = 1;
  private column = 1;

  constructor(readonly source: string) {}

  get atEnd(): boolean {
    return this.pos >= this.source.length;
  }

  location(): SourceLocation {
    return { line: this.line, column: this.column, offset: this.pos };
  }

  /** Character `offset` places ahead; '' past the end */
  peek(offset = 0): string {
    return this.source[this.pos + offset] ?? '';
  }

  next(): string {
    const ch = this.peek();
    this.pos++;
    if (ch === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return ch;
  }

  /** Consume characters while they match and return them */
  takeWhile(matches: (ch: string) => boolean): string {
    const startPos = this.pos;
    while (!this.atEnd && matches(this.peek())) {
      this.next();
    }
    return this.source.slice(startPos, this.pos);
  }

  /** Token from `start` to the current position */
  token(type: TokenType, value: string, start: SourceLocation): Token {
    return { type, value, span: { start, end: this.location() } };
  }
}
