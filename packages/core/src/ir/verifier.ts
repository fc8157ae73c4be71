/**
 * IR Verifier
 * Structural checks on a function before it is handed to a backend
 */

import type { IRFunction, IRModule } from './module.js';
import { operandsOf, type IRType, type IRValue } from './types.js';

function typeOf(value: IRValue): IRType {
  return value.type;
}

/**
 * Check a function's blocks and instructions.
 *
 * - each block is non-empty and ends in exactly one `ret`
 * - operands are constants, this function's parameters, or instructions
 *   emitted earlier in this function
 * - operand types match the opcode
 * - callees are in `module` and receive one argument per parameter
 *
 * @returns problem descriptions; empty when the function is well formed
 */
export function verifyFunction(fn: IRFunction, module: IRModule): string[] {
  const problems: string[] = [];
  const defined = new Set<IRValue>();

  const checkOperand = (value: IRValue, where: string): void => {
    if (value.kind === 'argument' && value.parent !== fn) {
      problems.push(`${where}: argument %${value.name} belongs to @${value.parent.name}`);
    }
    if (value.kind === 'instruction' && !defined.has(value)) {
      problems.push(`${where}: %${value.name} is used before it is defined`);
    }
  };

  const expectType = (value: IRValue, type: IRType, where: string): void => {
    if (typeOf(value) !== type) {
      problems.push(`${where}: expected ${type} operand, got ${typeOf(value)}`);
    }
  };

  for (const block of fn.blocks) {
    const last = block.instructions.length - 1;
    if (last < 0) {
      problems.push(`block ${block.name} is empty`);
      continue;
    }

    block.instructions.forEach((instruction, index) => {
      const where = `${block.name}#${index} ${instruction.opcode}`;

      for (const operand of operandsOf(instruction)) {
        checkOperand(operand, where);
      }

      switch (instruction.opcode) {
        case 'fadd':
        case 'fsub':
        case 'fmul':
        case 'fcmp':
          expectType(instruction.lhs, 'double', where);
          expectType(instruction.rhs, 'double', where);
          break;
        case 'uitofp':
          expectType(instruction.operand, 'i1', where);
          break;
        case 'call':
          if (module.lookupFunction(instruction.callee.name) !== instruction.callee) {
            problems.push(`${where}: @${instruction.callee.name} is not in the module`);
          }
          if (instruction.args.length !== instruction.callee.params.length) {
            problems.push(
              `${where}: @${instruction.callee.name} takes ${instruction.callee.params.length} arguments, got ${instruction.args.length}`
            );
          }
          for (const arg of instruction.args) {
            expectType(arg, 'double', where);
          }
          break;
        case 'ret':
          expectType(instruction.value, 'double', where);
          if (index !== last) {
            problems.push(`${where}: terminator in the middle of block ${block.name}`);
          }
          break;
      }

      if (instruction.kind === 'instruction') {
        defined.add(instruction);
      }
    });

    if (!block.terminator) {
      problems.push(`block ${block.name} has no terminator`);
    }
  }

  return problems;
}
