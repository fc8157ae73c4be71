/**
 * IR Builder
 * Appends instructions to a single block
 */

import { ModuleError } from '../types.js';
import type { BlockContext } from '../lowering/target.js';
import type { IRBlock, IRFunction } from './module.js';
import type {
  ArithmeticOpcode,
  IRConstant,
  IRInstruction,
  IRValue,
  ValueInstruction,
} from './types.js';

export class IRBuilder implements BlockContext<IRFunction, IRValue> {
  constructor(readonly block: IRBlock) {}

  get fn(): IRFunction {
    return this.block.parent;
  }

  constant(value: number): IRConstant {
    return { kind: 'constant', type: 'double', value };
  }

  /** @throws ModuleError (CALX-M004) for an index past the last parameter */
  param(index: number): IRValue {
    const arg = this.fn.params[index];
    if (!arg) {
      throw new ModuleError('CALX-M004', { name: this.fn.name, index });
    }
    return arg;
  }

  add(lhs: IRValue, rhs: IRValue): IRValue {
    return this.arithmetic('fadd', lhs, rhs, 'addtmp');
  }

  sub(lhs: IRValue, rhs: IRValue): IRValue {
    return this.arithmetic('fsub', lhs, rhs, 'subtmp');
  }

  mul(lhs: IRValue, rhs: IRValue): IRValue {
    return this.arithmetic('fmul', lhs, rhs, 'multmp');
  }

  lessThan(lhs: IRValue, rhs: IRValue): IRValue {
    return this.insert({
      kind: 'instruction',
      opcode: 'fcmp',
      predicate: 'ult',
      type: 'i1',
      name: this.fn.uniqueName('cmptmp'),
      lhs,
      rhs,
    });
  }

  toNumber(flag: IRValue): IRValue {
    return this.insert({
      kind: 'instruction',
      opcode: 'uitofp',
      type: 'double',
      name: this.fn.uniqueName('booltmp'),
      operand: flag,
    });
  }

  call(callee: IRFunction, args: readonly IRValue[]): IRValue {
    return this.insert({
      kind: 'instruction',
      opcode: 'call',
      type: 'double',
      name: this.fn.uniqueName('calltmp'),
      callee,
      args: [...args],
    });
  }

  ret(value: IRValue): void {
    this.append({ kind: 'terminator', opcode: 'ret', value });
  }

  private arithmetic(
    opcode: ArithmeticOpcode,
    lhs: IRValue,
    rhs: IRValue,
    name: string
  ): IRValue {
    return this.insert({
      kind: 'instruction',
      opcode,
      type: 'double',
      name: this.fn.uniqueName(name),
      lhs,
      rhs,
    });
  }

  private insert(instruction: ValueInstruction): ValueInstruction {
    this.append(instruction);
    return instruction;
  }

  /** @throws ModuleError (CALX-M002) once the block has a terminator */
  private append(instruction: IRInstruction): void {
    if (this.block.terminator) {
      throw new ModuleError('CALX-M002', {
        opcode: instruction.opcode,
        block: this.block.name,
        name: this.fn.name,
      });
    }
    this.block.instructions.push(instruction);
  }
}
