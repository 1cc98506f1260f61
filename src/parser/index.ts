/**
 * gcad Parser
 * Main entry point and re-exports
 */

import { tokenize } from '../lexer/index.js';
import { buildAst } from '../ast/index.js';
import type { ProgramNode, SyntaxNode } from '../types.js';
import { Parser } from './parser.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-script.js';
import './parser-expr.js';
import './parser-literals.js';
import './parser-functions.js';

// ============================================================
// MAIN ENTRY POINTS
// ============================================================

/**
 * Parse gcad source into a concrete syntax tree.
 *
 * Throws ParseError (or LexerError) on the first syntax error.
 *
 * @example
 * ```typescript
 * const cst = parseSyntax("drill(0mm, 0mm, 5mm);");
 * cst.children[0]?.rule; // 'statement'
 * ```
 */
export function parseSyntax(source: string): SyntaxNode {
  const parser = new Parser(tokenize(source));
  return parser.parse();
}

/**
 * Parse gcad source into an AST.
 *
 * @example
 * ```typescript
 * const ast = parse("x = 2mm * 3;");
 * ```
 */
export function parse(source: string): ProgramNode {
  return buildAst(parseSyntax(source));
}

// ============================================================
// RE-EXPORTS
// ============================================================

// State (for advanced usage)
export { createParserState, type ParserState } from './state.js';

// Parser class (for advanced usage)
export { Parser } from './parser.js';
