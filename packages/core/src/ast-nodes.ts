import type { SourceSpan } from './source-location.js';

interface BaseNode {
  readonly span: SourceSpan;
}

/** Name given to the function wrapping a bare top-level expression */
export const ANON_FUNCTION_NAME = '__anon_expr';

// ============================================================
// EXPRESSIONS
// ============================================================

export interface NumberLiteralNode extends BaseNode {
  readonly type: 'NumberLiteral';
  readonly value: number;
}

/**
 * Reference to a function parameter.
 * Resolved during lowering against the enclosing function's parameters.
 */
export interface VariableRefNode extends BaseNode {
  readonly type: 'VariableRef';
  readonly name: string;
}

export interface BinaryOpNode extends BaseNode {
  readonly type: 'BinaryOp';
  /** A character registered in the precedence table */
  readonly operator: string;
  readonly left: ExprNode;
  readonly right: ExprNode;
}

/**
 * Function call: callee(arg, ...)
 * The callee is looked up in the target module during lowering.
 */
export interface CallNode extends BaseNode {
  readonly type: 'Call';
  readonly callee: string;
  readonly args: readonly ExprNode[];
}

export type ExprNode = NumberLiteralNode | VariableRefNode | BinaryOpNode | CallNode;

// ============================================================
// FUNCTIONS
// ============================================================

/**
 * Function signature: name(param param ...)
 * Every parameter and the result are numbers.
 */
export interface PrototypeNode extends BaseNode {
  readonly type: 'Prototype';
  readonly name: string;
  readonly params: readonly string[];
}

export interface FunctionNode extends BaseNode {
  readonly type: 'Function';
  readonly prototype: PrototypeNode;
  /** Single expression whose value is returned */
  readonly body: ExprNode;
}

export function isAnonymousFunction(fn: FunctionNode): boolean {
  return (
    fn.prototype.name === ANON_FUNCTION_NAME &&
    fn.prototype.params.length === 0
  );
}
