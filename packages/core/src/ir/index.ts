/**
 * IR Module
 * In-memory target for lowering, with printer, verifier and interpreter
 */

export { IRBlock, IRFunction, IRModule } from './module.js';
export { IRBuilder } from './builder.js';
export { formatDouble, printFunction, printInstruction, printModule } from './printer.js';
export { verifyFunction } from './verifier.js';
export { Interpreter, type InterpreterOptions } from './interpreter.js';
export { createHostFunctions, type HostFunction } from './host.js';
export type {
  ArithmeticInstruction,
  ArithmeticOpcode,
  CallInstruction,
  CompareInstruction,
  ConvertInstruction,
  IRArgument,
  IRConstant,
  IRInstruction,
  IRType,
  IRValue,
  ReturnInstruction,
  ValueInstruction,
} from './types.js';
export { operandsOf } from './types.js';
