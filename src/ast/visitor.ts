/**
 * AST Visitor
 * Pre-order traversal over every node of a program.
 */

import type { ASTNode } from '../types.js';

/**
 * Recursively visit AST nodes, calling `enter` on each node before its
 * children, in source order.
 */
export function visitNode(
  node: ASTNode,
  enter: (node: ASTNode) => void
): void {
  enter(node);

  switch (node.type) {
    case 'Program':
    case 'Block':
      for (const stmt of node.statements) {
        visitNode(stmt, enter);
      }
      break;

    case 'Statement':
      visitNode(node.expression, enter);
      break;

    case 'ForLoop':
      visitNode(node.variable, enter);
      visitNode(node.source, enter);
      visitNode(node.body, enter);
      break;

    case 'Assignment':
      visitNode(node.target, enter);
      visitNode(node.value, enter);
      break;

    case 'BinaryExpr':
      visitNode(node.left, enter);
      visitNode(node.right, enter);
      break;

    case 'UnaryExpr':
    case 'FactorialExpr':
      visitNode(node.operand, enter);
      break;

    case 'FunctionCall':
      visitNode(node.callee, enter);
      for (const arg of node.args) {
        visitNode(arg, enter);
      }
      break;

    case 'NamedArg':
      visitNode(node.name, enter);
      visitNode(node.value, enter);
      break;

    case 'Identifier':
    case 'NumberLiteral':
    case 'StringLiteral':
      // Leaf nodes
      break;
  }
}
