/**
 * IR Printer
 * Textual, LLVM-flavoured rendering of functions and modules
 */

import type { IRBlock, IRFunction, IRModule } from './module.js';
import type { IRInstruction, IRValue } from './types.js';

/**
 * Render a double the way LLVM prints FP constants: six-digit mantissa
 * with a two-digit exponent, or raw bits in hex for NaN and infinities.
 *
 * @example
 * formatDouble(2)   // "2.000000e+00"
 * formatDouble(0.5) // "5.000000e-01"
 */
export function formatDouble(value: number): string {
  if (!Number.isFinite(value)) {
    const view = new DataView(new ArrayBuffer(8));
    view.setFloat64(0, value);
    const bits = view.getBigUint64(0).toString(16).toUpperCase();
    return `0x${bits.padStart(16, '0')}`;
  }

  const text = value.toExponential(6).replace(/e([+-])(\d)$/, 'e$10$2');
  return Object.is(value, -0) ? `-${text}` : text;
}

function formatOperand(value: IRValue): string {
  if (value.kind === 'constant') {
    return formatDouble(value.value);
  }
  return `%${value.name}`;
}

function formatTyped(value: IRValue): string {
  return `${value.type} ${formatOperand(value)}`;
}

export function printInstruction(instruction: IRInstruction): string {
  switch (instruction.opcode) {
    case 'fadd':
    case 'fsub':
    case 'fmul':
      return `%${instruction.name} = ${instruction.opcode} double ${formatOperand(instruction.lhs)}, ${formatOperand(instruction.rhs)}`;
    case 'fcmp':
      return `%${instruction.name} = fcmp ${instruction.predicate} double ${formatOperand(instruction.lhs)}, ${formatOperand(instruction.rhs)}`;
    case 'uitofp':
      return `%${instruction.name} = uitofp ${formatTyped(instruction.operand)} to double`;
    case 'call': {
      const args = instruction.args.map(formatTyped).join(', ');
      return `%${instruction.name} = call double @${instruction.callee.name}(${args})`;
    }
    case 'ret':
      return `ret ${formatTyped(instruction.value)}`;
  }
}

function printBlock(block: IRBlock): string[] {
  return [
    `${block.name}:`,
    ...block.instructions.map((instruction) => `  ${printInstruction(instruction)}`),
  ];
}

/**
 * @example
 * ```
 * define double @add(double %a, double %b) {
 * entry:
 *   %addtmp = fadd double %a, %b
 *   ret double %addtmp
 * }
 * ```
 */
export function printFunction(fn: IRFunction): string {
  if (fn.isDeclaration) {
    const params = fn.params.map(() => 'double').join(', ');
    return `declare double @${fn.name}(${params})`;
  }

  const params = fn.params.map((param) => `double %${param.name}`).join(', ');
  const lines = [`define double @${fn.name}(${params}) {`];
  fn.blocks.forEach((block, index) => {
    if (index > 0) lines.push('');
    lines.push(...printBlock(block));
  });
  lines.push('}');
  return lines.join('\n');
}

export function printModule(module: IRModule): string {
  const header = `; ModuleID = '${module.id}'`;
  const functions = module.list().map(printFunction);
  return [header, ...functions].join('\n\n') + '\n';
}
