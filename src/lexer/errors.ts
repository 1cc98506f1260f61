/**
 * Lexer Errors
 */

import { GCAD_ERROR_CODES, ParseError } from '../types.js';
import type { GcadErrorCode, SourceLocation } from '../types.js';

export class LexerError extends ParseError {
  constructor(
    message: string,
    location: SourceLocation,
    code: GcadErrorCode = GCAD_ERROR_CODES.LEXER_UNEXPECTED_CHARACTER,
    context?: Record<string, unknown>
  ) {
    super(message, location, context, code);
    this.name = 'LexerError';
  }
}
