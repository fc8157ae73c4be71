/**
 * IR Types
 * SSA-style values and instructions held by an IRModule
 */

import type { IRFunction } from './module.js';

export type IRType = 'double' | 'i1';

export type ArithmeticOpcode = 'fadd' | 'fsub' | 'fmul';

export interface IRConstant {
  readonly kind: 'constant';
  readonly type: 'double';
  readonly value: number;
}

export interface IRArgument {
  readonly kind: 'argument';
  readonly type: 'double';
  readonly name: string;
  readonly index: number;
  readonly parent: IRFunction;
}

export interface ArithmeticInstruction {
  readonly kind: 'instruction';
  readonly opcode: ArithmeticOpcode;
  readonly type: 'double';
  readonly name: string;
  readonly lhs: IRValue;
  readonly rhs: IRValue;
}

/** Unordered less-than: true when either operand is NaN */
export interface CompareInstruction {
  readonly kind: 'instruction';
  readonly opcode: 'fcmp';
  readonly predicate: 'ult';
  readonly type: 'i1';
  readonly name: string;
  readonly lhs: IRValue;
  readonly rhs: IRValue;
}

/** Unsigned integer (i1) to double */
export interface ConvertInstruction {
  readonly kind: 'instruction';
  readonly opcode: 'uitofp';
  readonly type: 'double';
  readonly name: string;
  readonly operand: IRValue;
}

export interface CallInstruction {
  readonly kind: 'instruction';
  readonly opcode: 'call';
  readonly type: 'double';
  readonly name: string;
  readonly callee: IRFunction;
  readonly args: readonly IRValue[];
}

export interface ReturnInstruction {
  readonly kind: 'terminator';
  readonly opcode: 'ret';
  readonly value: IRValue;
}

export type ValueInstruction =
  | ArithmeticInstruction
  | CompareInstruction
  | ConvertInstruction
  | CallInstruction;

export type IRInstruction = ValueInstruction | ReturnInstruction;

export type IRValue = IRConstant | IRArgument | ValueInstruction;

/** Values an instruction reads, in operand order */
export function operandsOf(instruction: IRInstruction): readonly IRValue[] {
  switch (instruction.opcode) {
    case 'fadd':
    case 'fsub':
    case 'fmul':
    case 'fcmp':
      return [instruction.lhs, instruction.rhs];
    case 'uitofp':
      return [instruction.operand];
    case 'call':
      return instruction.args;
    case 'ret':
      return [instruction.value];
  }
}
