/**
 * Lowering
 * Walks AST nodes and emits instructions into a target module
 */

import type {
  BinaryOpNode,
  CallNode,
  ExprNode,
  FunctionNode,
  PrototypeNode,
  Result,
} from '../types.js';
import { err, LoweringError, ok } from '../types.js';
import type { BlockContext, TargetModule } from './target.js';

/** Outcome of lowering a node: the emitted handle, or the first failure */
export type LowerResult<T> = Result<T, LoweringError>;

/**
 * Lowers prototypes and functions into `module`.
 *
 * One instance serves many functions; the symbol table is rebuilt at the
 * start of each function body.
 *
 * @example
 * ```typescript
 * const module = new IRModule();
 * const lowering = new Lowering(module);
 * const fn = lowering.lowerFunction(definition);
 * ```
 */
export class Lowering<F, V> {
  private namedValues = new Map<string, V>();

  constructor(readonly module: TargetModule<F, V>) {}

  // ============================================================
  // EXPRESSIONS
  // ============================================================

  lowerExpr(node: ExprNode, ctx: BlockContext<F, V>): LowerResult<V> {
    switch (node.type) {
      case 'NumberLiteral':
        return ok(ctx.constant(node.value));

      case 'VariableRef': {
        const value = this.namedValues.get(node.name);
        if (value === undefined) {
          return err(
            LoweringError.fromNode('CALX-G001', node, {
              name: node.name,
              candidates: [...this.namedValues.keys()],
            })
          );
        }
        return ok(value);
      }

      case 'BinaryOp':
        return this.lowerBinaryOp(node, ctx);

      case 'Call':
        return this.lowerCall(node, ctx);
    }
  }

  private lowerBinaryOp(node: BinaryOpNode, ctx: BlockContext<F, V>): LowerResult<V> {
    const left = this.lowerExpr(node.left, ctx);
    if (!left.ok) return left;
    const right = this.lowerExpr(node.right, ctx);
    if (!right.ok) return right;

    switch (node.operator) {
      case '+':
        return ok(ctx.add(left.value, right.value));
      case '-':
        return ok(ctx.sub(left.value, right.value));
      case '*':
        return ok(ctx.mul(left.value, right.value));
      case '<':
        return ok(ctx.toNumber(ctx.lessThan(left.value, right.value)));
      default:
        return err(
          LoweringError.fromNode('CALX-G002', node, { operator: node.operator })
        );
    }
  }

  private lowerCall(node: CallNode, ctx: BlockContext<F, V>): LowerResult<V> {
    const callee = this.module.lookupFunction(node.callee);
    if (callee === undefined) {
      return err(LoweringError.fromNode('CALX-G003', node, { name: node.callee }));
    }

    const expected = this.module.paramNames(callee).length;
    if (expected !== node.args.length) {
      return err(
        LoweringError.fromNode('CALX-G004', node, {
          name: node.callee,
          expected,
          actual: node.args.length,
        })
      );
    }

    const args: V[] = [];
    for (const arg of node.args) {
      const value = this.lowerExpr(arg, ctx);
      if (!value.ok) return value;
      args.push(value.value);
    }
    return ok(ctx.call(callee, args));
  }

  // ============================================================
  // FUNCTIONS
  // ============================================================

  /**
   * Declare the prototype's signature, or reuse an existing declaration
   * with the same parameter count.
   */
  lowerPrototype(node: PrototypeNode): LowerResult<F> {
    const existing = this.module.lookupFunction(node.name);
    if (existing === undefined) {
      return ok(this.module.declareFunction(node.name, node.params));
    }

    const expected = this.module.paramNames(existing).length;
    if (expected !== node.params.length) {
      return err(
        LoweringError.fromNode('CALX-G005', node, {
          name: node.name,
          expected,
          actual: node.params.length,
        })
      );
    }
    return ok(existing);
  }

  /**
   * Lower a definition: signature, fresh block, body, return, verification.
   * The body sees the parameters under the names the module recorded for
   * the signature. On a body or verification failure a function declared
   * here is erased; an earlier declaration only loses the new block.
   */
  lowerFunction(node: FunctionNode): LowerResult<F> {
    const created = this.module.lookupFunction(node.prototype.name) === undefined;
    const declared = this.lowerPrototype(node.prototype);
    if (!declared.ok) return declared;
    const fn = declared.value;

    const rollback = (): void => {
      if (created) {
        this.module.eraseFunction(fn);
      } else {
        this.module.discardFunctionBody(fn);
      }
    };

    const ctx = this.module.beginFunctionBody(fn);

    this.namedValues = new Map();
    this.module.paramNames(fn).forEach((name, index) => {
      this.namedValues.set(name, ctx.param(index));
    });

    const body = this.lowerExpr(node.body, ctx);
    if (!body.ok) {
      rollback();
      return body;
    }
    ctx.ret(body.value);

    const problems = this.module.verifyFunction(fn);
    if (problems.length > 0) {
      rollback();
      return err(
        LoweringError.fromNode('CALX-G006', node, {
          name: node.prototype.name,
          problems,
        })
      );
    }

    return ok(fn);
  }
}
