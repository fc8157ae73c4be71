/**
 * Calx Parser
 * Main entry points and re-exports
 */

import { createScanner, type CharSource } from '../lexer/index.js';
import type { ExprNode } from '../types.js';
import { Parser, type ParseResult, type ParserOptions } from './parser.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-expr.js';
import './parser-functions.js';

// ============================================================
// MAIN ENTRY POINTS
// ============================================================

/**
 * Create a parser positioned on the first token of `source`.
 *
 * @example
 * ```typescript
 * const parser = createParser('extern sin(x)');
 * const proto = parser.parseExtern();
 * ```
 */
export function createParser(
  source: string | CharSource,
  options: ParserOptions = {}
): Parser {
  return new Parser(createScanner(source), options);
}

/**
 * Parse a single expression spanning the whole input.
 * Fails with CALX-P008 when input remains after the expression.
 *
 * @example
 * ```typescript
 * const result = parseExpression('1+2*3');
 * if (result.ok) console.log(result.value.type); // "BinaryOp"
 * ```
 */
export function parseExpression(
  source: string,
  options: ParserOptions = {}
): ParseResult<ExprNode> {
  const parser = createParser(source, options);
  const result = parser.parseExpression();
  if (!result.ok) return result;

  if (parser.current.type !== 'EOF') {
    return parser.fail('CALX-P008');
  }
  return result;
}

// ============================================================
// RE-EXPORTS
// ============================================================

export { createParserState, type ParserState } from './state.js';
export { Parser, type ParseResult, type ParserOptions } from './parser.js';
export {
  DEFAULT_PRECEDENCE,
  NOT_AN_OPERATOR,
  PrecedenceTable,
} from './precedence.js';
