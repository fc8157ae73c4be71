/**
 * Lowering Module
 * AST to target module translation
 */

export { Lowering, type LowerResult } from './lowering.js';
export type { BlockContext, TargetModule } from './target.js';
