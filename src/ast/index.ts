/**
 * gcad AST
 */

export { buildAst } from './builder.js';
export { visitNode } from './visitor.js';
