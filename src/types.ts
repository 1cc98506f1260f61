/**
 * gcad Types
 * Source locations, error hierarchy, tokens, syntax tree and AST nodes.
 */

// ============================================================
// SOURCE LOCATION
// ============================================================

export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

// ============================================================
// ERROR HIERARCHY
// ============================================================

/** Error codes for programmatic handling */
export const GCAD_ERROR_CODES = {
  // Lexer and parse errors
  LEXER_UNEXPECTED_CHARACTER: 'LEXER_UNEXPECTED_CHARACTER',
  LEXER_UNTERMINATED_STRING: 'LEXER_UNTERMINATED_STRING',
  LEXER_INVALID_UNIT: 'LEXER_INVALID_UNIT',
  PARSE_UNEXPECTED_TOKEN: 'PARSE_UNEXPECTED_TOKEN',
  PARSE_MALFORMED_TREE: 'PARSE_MALFORMED_TREE',

  // Runtime errors
  RUNTIME_UNDEFINED_VARIABLE: 'RUNTIME_UNDEFINED_VARIABLE',
  RUNTIME_UNDEFINED_FUNCTION: 'RUNTIME_UNDEFINED_FUNCTION',
  RUNTIME_TYPE_ERROR: 'RUNTIME_TYPE_ERROR',
  RUNTIME_BINDING_ERROR: 'RUNTIME_BINDING_ERROR',
  RUNTIME_INVALID_OPERATION: 'RUNTIME_INVALID_OPERATION',
  RUNTIME_LIMIT_EXCEEDED: 'RUNTIME_LIMIT_EXCEEDED',

  // Configuration errors
  CONFIG_UNKNOWN_MATERIAL: 'CONFIG_UNKNOWN_MATERIAL',
  CONFIG_INVALID: 'CONFIG_INVALID',
} as const;

export type GcadErrorCode =
  (typeof GCAD_ERROR_CODES)[keyof typeof GCAD_ERROR_CODES];

/** User-facing error taxonomy */
export type ErrorKind =
  | 'SyntaxError'
  | 'NameError'
  | 'TypeError'
  | 'BindingError'
  | 'ConfigError'
  | 'RuntimeError';

const ERROR_KINDS: Record<GcadErrorCode, ErrorKind> = {
  LEXER_UNEXPECTED_CHARACTER: 'SyntaxError',
  LEXER_UNTERMINATED_STRING: 'SyntaxError',
  LEXER_INVALID_UNIT: 'SyntaxError',
  PARSE_UNEXPECTED_TOKEN: 'SyntaxError',
  PARSE_MALFORMED_TREE: 'SyntaxError',
  RUNTIME_UNDEFINED_VARIABLE: 'NameError',
  RUNTIME_UNDEFINED_FUNCTION: 'NameError',
  RUNTIME_TYPE_ERROR: 'TypeError',
  RUNTIME_BINDING_ERROR: 'BindingError',
  RUNTIME_INVALID_OPERATION: 'RuntimeError',
  RUNTIME_LIMIT_EXCEEDED: 'RuntimeError',
  CONFIG_UNKNOWN_MATERIAL: 'ConfigError',
  CONFIG_INVALID: 'ConfigError',
};

/** Map an error code to its user-facing kind */
export function errorKindOf(code: GcadErrorCode): ErrorKind {
  return ERROR_KINDS[code];
}

/** Structured error data for host applications */
export interface GcadErrorData {
  readonly code: GcadErrorCode;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

/**
 * Base error class for all gcad errors.
 * Provides structured data for host applications to format as needed.
 */
export class GcadError extends Error {
  readonly code: GcadErrorCode;
  readonly kind: ErrorKind;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: GcadErrorData) {
    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'GcadError';
    this.code = data.code;
    this.kind = errorKindOf(data.code);
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): GcadErrorData {
    return {
      code: this.code,
      message: this.message.replace(/ at \d+:\d+$/, ''), // Strip location suffix
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: GcadErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return `${this.kind}: ${this.message}`;
  }
}

/** Parse-time errors (SyntaxError kind) */
export class ParseError extends GcadError {
  override readonly location: SourceLocation;

  constructor(
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>,
    code: GcadErrorCode = GCAD_ERROR_CODES.PARSE_UNEXPECTED_TOKEN
  ) {
    super({ code, message, location, context });
    this.name = 'ParseError';
    this.location = location;
  }
}

/** Runtime execution errors; the code selects the error kind */
export class RuntimeError extends GcadError {
  constructor(
    code: GcadErrorCode,
    message: string,
    location?: SourceLocation,
    context?: Record<string, unknown>
  ) {
    super({ code, message, location, context });
    this.name = 'RuntimeError';
  }

  /** Create from an AST node */
  static fromNode(
    code: GcadErrorCode,
    message: string,
    node?: { span: SourceSpan },
    context?: Record<string, unknown>
  ): RuntimeError {
    return new RuntimeError(code, message, node?.span.start, context);
  }
}

/** Unknown materials and invalid machine configuration */
export class ConfigError extends GcadError {
  constructor(
    message: string,
    location?: SourceLocation,
    context?: Record<string, unknown>,
    code: GcadErrorCode = GCAD_ERROR_CODES.CONFIG_INVALID
  ) {
    super({ code, message, location, context });
    this.name = 'ConfigError';
  }
}

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Literals
  STRING: 'STRING',
  NUMBER: 'NUMBER',
  UNIT: 'UNIT',

  // Identifiers and keywords
  IDENTIFIER: 'IDENTIFIER',
  FOR: 'FOR',
  IN: 'IN',

  // Operators
  PLUS: 'PLUS',
  MINUS: 'MINUS',
  STAR: 'STAR',
  SLASH: 'SLASH',
  CARET: 'CARET',
  BANG: 'BANG',
  ASSIGN: 'ASSIGN',

  // Delimiters
  LPAREN: 'LPAREN',
  RPAREN: 'RPAREN',
  LBRACE: 'LBRACE',
  RBRACE: 'RBRACE',
  COMMA: 'COMMA',
  SEMICOLON: 'SEMICOLON',

  // Special
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

export interface Token {
  readonly type: TokenType;
  readonly value: string;
  readonly span: SourceSpan;
}

/** Human-readable token descriptions for error messages */
export const TOKEN_DESCRIPTIONS: Record<TokenType, string> = {
  STRING: 'string',
  NUMBER: 'number',
  UNIT: 'unit suffix',
  IDENTIFIER: 'identifier',
  FOR: "'for'",
  IN: "'in'",
  PLUS: "'+'",
  MINUS: "'-'",
  STAR: "'*'",
  SLASH: "'/'",
  CARET: "'^'",
  BANG: "'!'",
  ASSIGN: "'='",
  LPAREN: "'('",
  RPAREN: "')'",
  LBRACE: "'{'",
  RBRACE: "'}'",
  COMMA: "','",
  SEMICOLON: "';'",
  EOF: 'end of input',
};

// ============================================================
// LENGTH UNITS
// ============================================================

export const LENGTH_UNITS = ['mm', 'cm', 'm', 'in', 'ft', 'yd'] as const;
export type LengthUnit = (typeof LENGTH_UNITS)[number];

export function isLengthUnit(value: string): value is LengthUnit {
  return LENGTH_UNITS.some((unit) => unit === value);
}

// ============================================================
// CONCRETE SYNTAX TREE
// ============================================================

/** Grammar rule names, one per syntax node kind */
export type SyntaxRule =
  | 'program'
  | 'statement'
  | 'forLoop'
  | 'block'
  | 'assign'
  | 'additive'
  | 'multiplicative'
  | 'unary'
  | 'power'
  | 'postfix'
  | 'group'
  | 'funcCall'
  | 'params'
  | 'positionalParam'
  | 'namedParam'
  | 'string'
  | 'integer'
  | 'decimal'
  | 'unitNumber'
  | 'ident'
  | 'operator';

/**
 * Parse-tree node. Leaves carry their token; operator chains keep
 * operands and operator leaves interleaved in source order.
 */
export interface SyntaxNode {
  readonly rule: SyntaxRule;
  readonly span: SourceSpan;
  readonly children: readonly SyntaxNode[];
  readonly token?: Token | undefined;
}

// ============================================================
// AST NODES
// ============================================================

export type NodeType =
  | 'Program'
  | 'Statement'
  | 'ForLoop'
  | 'Block'
  | 'Assignment'
  | 'BinaryExpr'
  | 'UnaryExpr'
  | 'FactorialExpr'
  | 'FunctionCall'
  | 'NamedArg'
  | 'Identifier'
  | 'NumberLiteral'
  | 'StringLiteral';

interface BaseNode {
  readonly type: NodeType;
  readonly span: SourceSpan;
}

export interface ProgramNode extends BaseNode {
  readonly type: 'Program';
  readonly statements: readonly StatementLike[];
}

/** Top-level and block statements */
export type StatementLike = StatementNode | ForLoopNode;

export interface StatementNode extends BaseNode {
  readonly type: 'Statement';
  readonly expression: ExpressionNode;
}

export interface ForLoopNode extends BaseNode {
  readonly type: 'ForLoop';
  readonly variable: IdentifierNode;
  readonly source: ExpressionNode;
  readonly body: BlockNode;
}

export interface BlockNode extends BaseNode {
  readonly type: 'Block';
  readonly statements: readonly StatementLike[];
}

export interface AssignmentNode extends BaseNode {
  readonly type: 'Assignment';
  readonly target: IdentifierNode;
  readonly value: ExpressionNode;
}

export type BinaryOp = '+' | '-' | '*' | '/' | '^';

export interface BinaryExprNode extends BaseNode {
  readonly type: 'BinaryExpr';
  readonly op: BinaryOp;
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
}

export interface UnaryExprNode extends BaseNode {
  readonly type: 'UnaryExpr';
  readonly op: '-';
  readonly operand: ExpressionNode;
}

export interface FactorialExprNode extends BaseNode {
  readonly type: 'FactorialExpr';
  readonly operand: ExpressionNode;
}

export interface NamedArgNode extends BaseNode {
  readonly type: 'NamedArg';
  readonly name: IdentifierNode;
  readonly value: ExpressionNode;
}

export interface FunctionCallNode extends BaseNode {
  readonly type: 'FunctionCall';
  readonly callee: IdentifierNode;
  /** Arguments in source order; positional and named may be mixed */
  readonly args: readonly (ExpressionNode | NamedArgNode)[];
}

export interface IdentifierNode extends BaseNode {
  readonly type: 'Identifier';
  readonly name: string;
}

export interface NumberLiteralNode extends BaseNode {
  readonly type: 'NumberLiteral';
  readonly value: number;
  /** Unit suffix as written in the source; null for unitless numbers */
  readonly unit: LengthUnit | null;
}

export interface StringLiteralNode extends BaseNode {
  readonly type: 'StringLiteral';
  readonly value: string;
}

export type ExpressionNode =
  | AssignmentNode
  | BinaryExprNode
  | UnaryExprNode
  | FactorialExprNode
  | FunctionCallNode
  | IdentifierNode
  | NumberLiteralNode
  | StringLiteralNode;

export type ASTNode =
  | ProgramNode
  | StatementNode
  | ForLoopNode
  | BlockNode
  | NamedArgNode
  | ExpressionNode;
