/**
 * Test Helpers: AST rendering
 */

import type { ExprNode } from '../../src/index.js';

/** Compact prefix rendering: (+ 1 (* 2 3)), foo(1, x) */
export function show(node: ExprNode): string {
  switch (node.type) {
    case 'NumberLiteral':
      return String(node.value);
    case 'VariableRef':
      return node.name;
    case 'BinaryOp':
      return `(${node.operator} ${show(node.left)} ${show(node.right)})`;
    case 'Call':
      return `${node.callee}(${node.args.map(show).join(', ')})`;
  }
}
