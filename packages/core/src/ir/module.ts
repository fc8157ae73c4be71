/**
 * IR Module
 * In-memory target module: functions, blocks and their instructions
 */

import { ModuleError } from '../types.js';
import type { TargetModule } from '../lowering/target.js';
import { IRBuilder } from './builder.js';
import { printFunction, printModule } from './printer.js';
import type { IRArgument, IRInstruction, IRValue } from './types.js';
import { verifyFunction } from './verifier.js';

// ============================================================
// BLOCKS
// ============================================================

export class IRBlock {
  readonly instructions: IRInstruction[] = [];

  constructor(
    readonly name: string,
    readonly parent: IRFunction
  ) {}

  /** The block's `ret`, if it has been emitted */
  get terminator(): IRInstruction | undefined {
    const last = this.instructions[this.instructions.length - 1];
    return last?.kind === 'terminator' ? last : undefined;
  }
}

// ============================================================
// FUNCTIONS
// ============================================================

/**
 * A function of `params.length` doubles returning a double.
 * Without blocks it is a declaration (e.g. from `extern`).
 */
export class IRFunction {
  readonly params: IRArgument[];
  readonly blocks: IRBlock[] = [];
  private readonly usedNames = new Set<string>();
  private readonly nameCounters = new Map<string, number>();

  constructor(
    readonly name: string,
    paramNames: readonly string[]
  ) {
    this.params = paramNames.map((paramName, index): IRArgument => ({
      kind: 'argument',
      type: 'double',
      name: this.uniqueName(paramName),
      index,
      parent: this,
    }));
  }

  get isDeclaration(): boolean {
    return this.blocks.length === 0;
  }

  /** The block execution starts in */
  get entry(): IRBlock | undefined {
    return this.blocks[0];
  }

  /** Remove and return the most recently appended block */
  popBlock(): IRBlock | undefined {
    return this.blocks.pop();
  }

  appendBlock(name: string): IRBlock {
    const block = new IRBlock(this.uniqueName(name), this);
    this.blocks.push(block);
    return block;
  }

  /** `base`, or `base` with the lowest free numeric suffix */
  uniqueName(base: string): string {
    let name = base;
    let counter = this.nameCounters.get(base) ?? 0;
    while (this.usedNames.has(name)) {
      counter++;
      name = `${base}${counter}`;
    }
    this.nameCounters.set(base, counter);
    this.usedNames.add(name);
    return name;
  }
}

// ============================================================
// MODULE
// ============================================================

export class IRModule implements TargetModule<IRFunction, IRValue> {
  private readonly functions = new Map<string, IRFunction>();

  constructor(readonly id = 'calx') {}

  /** @throws ModuleError (CALX-M001) when the name is taken */
  declareFunction(name: string, paramNames: readonly string[]): IRFunction {
    if (this.functions.has(name)) {
      throw new ModuleError('CALX-M001', { name });
    }
    const fn = new IRFunction(name, paramNames);
    this.functions.set(name, fn);
    return fn;
  }

  lookupFunction(name: string): IRFunction | undefined {
    return this.functions.get(name);
  }

  paramNames(fn: IRFunction): readonly string[] {
    return fn.params.map((param) => param.name);
  }

  /** @throws ModuleError (CALX-M003) when `fn` is not in this module */
  beginFunctionBody(fn: IRFunction): IRBuilder {
    this.assertOwned(fn);
    return new IRBuilder(fn.appendBlock('entry'));
  }

  /** @throws ModuleError (CALX-M003) when `fn` is not in this module */
  discardFunctionBody(fn: IRFunction): void {
    this.assertOwned(fn);
    fn.popBlock();
  }

  /** @throws ModuleError (CALX-M003) when `fn` is not in this module */
  eraseFunction(fn: IRFunction): void {
    this.assertOwned(fn);
    this.functions.delete(fn.name);
  }

  verifyFunction(fn: IRFunction): readonly string[] {
    return verifyFunction(fn, this);
  }

  /** Functions in declaration order */
  list(): IRFunction[] {
    return [...this.functions.values()];
  }

  get size(): number {
    return this.functions.size;
  }

  printFunction(fn: IRFunction): string {
    return printFunction(fn);
  }

  print(): string {
    return printModule(this);
  }

  private assertOwned(fn: IRFunction): void {
    if (this.functions.get(fn.name) !== fn) {
      throw new ModuleError('CALX-M003', { name: fn.name });
    }
  }
}
