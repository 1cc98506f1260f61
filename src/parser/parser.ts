/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type { SyntaxNode, Token } from '../types.js';
import { type ParserState, createParserState } from './state.js';

/**
 * Parser class that converts tokens into a concrete syntax tree.
 *
 * Methods are organized across multiple files:
 * - parser-script.ts: Program, statements, for loops, blocks
 * - parser-expr.ts: Assignment and the operator precedence chain
 * - parser-literals.ts: Strings, numbers, unit numbers, identifiers
 * - parser-functions.ts: Function calls and parameter lists
 *
 * @example
 * ```typescript
 * const parser = new Parser(tokens);
 * const cst = parser.parse();
 * ```
 */
export class Parser {
  /** Parser state including tokens and position */
  state: ParserState;

  constructor(tokens: readonly Token[]) {
    this.state = createParserState(tokens);
  }

  /**
   * Parse tokens into a complete syntax tree.
   */
  parse(): SyntaxNode {
    return this.parseProgram();
  }
}
