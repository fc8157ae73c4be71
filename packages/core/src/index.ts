/**
 * Calx Module
 * Exports scanner, parser, lowering, IR module and driver session
 */

export {
  createScanner,
  createScannerState,
  nextToken,
  parseDecimal,
  stringSource,
  tokenize,
  type CharSource,
  type ScannerState,
} from './lexer/index.js';
export {
  createParser,
  createParserState,
  DEFAULT_PRECEDENCE,
  NOT_AN_OPERATOR,
  parseExpression,
  Parser,
  PrecedenceTable,
  type ParseResult,
  type ParserOptions,
  type ParserState,
} from './parser/index.js';
export {
  Lowering,
  type BlockContext,
  type LowerResult,
  type TargetModule,
} from './lowering/index.js';
export * from './ir/index.js';
export * from './session/index.js';
export * from './types.js';
export { VERSION } from './version.js';
