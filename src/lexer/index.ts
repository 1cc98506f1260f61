/**
 * gcad Lexer
 */

export { LexerError } from './errors.js';
export { tokenize, nextTokens } from './tokenizer.js';
export { Scanner } from './scanner.js';
