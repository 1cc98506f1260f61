/**
 * Operator Lookup Tables
 */

import type { TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

/** Single-character operator lookup table */
export const SINGLE_CHAR_OPERATORS: Record<string, TokenType> = {
  '+': TOKEN_TYPES.PLUS,
  '-': TOKEN_TYPES.MINUS,
  '*': TOKEN_TYPES.STAR,
  '/': TOKEN_TYPES.SLASH,
  '^': TOKEN_TYPES.CARET,
  '!': TOKEN_TYPES.BANG,
  '=': TOKEN_TYPES.ASSIGN,
  '(': TOKEN_TYPES.LPAREN,
  ')': TOKEN_TYPES.RPAREN,
  '{': TOKEN_TYPES.LBRACE,
  '}': TOKEN_TYPES.RBRACE,
  ',': TOKEN_TYPES.COMMA,
  ';': TOKEN_TYPES.SEMICOLON,
};

/** Keyword lookup table */
export const KEYWORDS: Record<string, TokenType> = {
  for: TOKEN_TYPES.FOR,
  in: TOKEN_TYPES.IN,
};
