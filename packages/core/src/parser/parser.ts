/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Productions are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type { ScannerState } from '../lexer/index.js';
import type { Err, Result, Token } from '../types.js';
import { describeToken, err, ParseError } from '../types.js';
import { PrecedenceTable } from './precedence.js';
import {
  advance,
  createParserState,
  current,
  type ParserState,
} from './state.js';

/** Outcome of a production: the node, or the first syntax error */
export type ParseResult<T> = Result<T, ParseError>;

export interface ParserOptions {
  /** Binary operators; defaults to DEFAULT_PRECEDENCE */
  precedence?: PrecedenceTable | undefined;
}

/**
 * Single-token-lookahead parser that converts tokens into an AST.
 *
 * Productions are organized across multiple files:
 * - parser-expr.ts: primary, identifier, parenthesized and binary expressions
 * - parser-functions.ts: prototypes, definitions, externs, top-level expressions
 *
 * Productions never skip tokens after a failure; recovery is up to the
 * caller (see `advance`).
 *
 * @example
 * ```typescript
 * const parser = new Parser(createScanner('def add(a b) a+b'));
 * const fn = parser.parseDefinition();
 * ```
 */
export class Parser {
  state: ParserState;

  constructor(scanner: ScannerState, options: ParserOptions = {}) {
    this.state = createParserState(
      scanner,
      options.precedence ?? PrecedenceTable.withDefaults()
    );
  }

  /** The lookahead token */
  get current(): Token {
    return current(this.state);
  }

  /** Consume the lookahead token */
  advance(): Token {
    return advance(this.state);
  }

  /** Build a failure located at the lookahead token */
  fail(errorId: string, context: Record<string, unknown> = {}): Err<ParseError> {
    const token = current(this.state);
    return err(
      new ParseError(
        errorId,
        { found: describeToken(token), ...context },
        token.span.start
      )
    );
  }
}
