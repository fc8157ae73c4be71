/**
 * IR Interpreter
 * Executes module functions in process
 */

import { ExecutionError } from '../types.js';
import type { IRFunction, IRModule } from './module.js';
import type { HostFunction } from './host.js';
import type { IRValue } from './types.js';

export interface InterpreterOptions {
  /** Implementations for declarations without a body, by name */
  hostFunctions?: Readonly<Record<string, HostFunction>> | undefined;
  /** Nested call limit (default: 1000) */
  maxCallDepth?: number | undefined;
}

const DEFAULT_MAX_CALL_DEPTH = 1000;

export class Interpreter {
  private readonly hostFunctions: ReadonlyMap<string, HostFunction>;
  private readonly maxCallDepth: number;

  constructor(
    private readonly module: IRModule,
    options: InterpreterOptions = {}
  ) {
    this.hostFunctions = new Map(Object.entries(options.hostFunctions ?? {}));
    this.maxCallDepth = options.maxCallDepth ?? DEFAULT_MAX_CALL_DEPTH;
  }

  /**
   * Call a function of the module by name.
   *
   * @throws ExecutionError (CALX-R001) when no function has that name
   */
  run(name: string, args: readonly number[] = []): number {
    const fn = this.module.lookupFunction(name);
    if (!fn) {
      throw new ExecutionError('CALX-R001', { name });
    }
    return this.call(fn, args, 0);
  }

  /**
   * Execute `fn`'s entry block; declarations dispatch to host functions.
   *
   * @throws ExecutionError (CALX-R002) for a declaration the host lacks,
   * (CALX-R003) past the call depth limit, (CALX-R004) on argument count
   * mismatch, (CALX-R005) when the entry block has no `ret`
   */
  call(fn: IRFunction, args: readonly number[], depth: number): number {
    if (depth >= this.maxCallDepth) {
      throw new ExecutionError('CALX-R003', { limit: this.maxCallDepth });
    }
    if (args.length !== fn.params.length) {
      throw new ExecutionError('CALX-R004', {
        name: fn.name,
        expected: fn.params.length,
        actual: args.length,
      });
    }

    const entry = fn.entry;
    if (!entry) {
      const host = this.hostFunctions.get(fn.name);
      if (!host) {
        throw new ExecutionError('CALX-R002', { name: fn.name });
      }
      return host(...args);
    }

    const values = new Map<IRValue, number>();
    const read = (value: IRValue): number => {
      switch (value.kind) {
        case 'constant':
          return value.value;
        case 'argument':
          return args[value.index] ?? Number.NaN;
        case 'instruction':
          return values.get(value) ?? Number.NaN;
      }
    };

    for (const instruction of entry.instructions) {
      switch (instruction.opcode) {
        case 'fadd':
          values.set(instruction, read(instruction.lhs) + read(instruction.rhs));
          break;
        case 'fsub':
          values.set(instruction, read(instruction.lhs) - read(instruction.rhs));
          break;
        case 'fmul':
          values.set(instruction, read(instruction.lhs) * read(instruction.rhs));
          break;
        case 'fcmp':
          // unordered: NaN compares true
          values.set(instruction, read(instruction.lhs) >= read(instruction.rhs) ? 0 : 1);
          break;
        case 'uitofp':
          values.set(instruction, read(instruction.operand));
          break;
        case 'call':
          values.set(
            instruction,
            this.call(instruction.callee, instruction.args.map(read), depth + 1)
          );
          break;
        case 'ret':
          return read(instruction.value);
      }
    }

    throw new ExecutionError('CALX-R005', { name: fn.name, block: entry.name });
  }
}
