/**
 * Target Module Interface
 *
 * The capability lowering emits into. The lowering pass never inspects a
 * module's representation beyond these operations.
 */

/**
 * A mutable collection of function declarations and definitions keyed by
 * unique name.
 *
 * @typeParam F - function handle
 * @typeParam V - value handle produced by emission primitives
 */
export interface TargetModule<F, V> {
  /** Declare a function of `paramNames.length` numbers returning a number */
  declareFunction(name: string, paramNames: readonly string[]): F;
  lookupFunction(name: string): F | undefined;
  /** Parameter names as the module recorded them, in order */
  paramNames(fn: F): readonly string[];
  /** Append a fresh block to `fn` and return a context emitting into it */
  beginFunctionBody(fn: F): BlockContext<F, V>;
  /** Drop the block the latest `beginFunctionBody` appended to `fn` */
  discardFunctionBody(fn: F): void;
  /** Remove `fn` and everything emitted into it */
  eraseFunction(fn: F): void;
  /** Problems found in `fn`; empty when well formed */
  verifyFunction(fn: F): readonly string[];
}

/** Instruction emission scoped to one block */
export interface BlockContext<F, V> {
  constant(value: number): V;
  /** Value of the function's parameter at `index` */
  param(index: number): V;
  add(lhs: V, rhs: V): V;
  sub(lhs: V, rhs: V): V;
  mul(lhs: V, rhs: V): V;
  /** Boolean-like comparison result */
  lessThan(lhs: V, rhs: V): V;
  /** Widen a comparison result to a number: 1 for true, 0 for false */
  toNumber(flag: V): V;
  call(callee: F, args: readonly V[]): V;
  /** Terminate the block returning `value` */
  ret(value: V): void;
}
