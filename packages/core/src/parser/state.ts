/**
 * Parser State
 * Current token and token navigation utilities
 */

import { nextToken, type ScannerState } from '../lexer/index.js';
import type { Token } from '../types.js';
import { NOT_AN_OPERATOR, type PrecedenceTable } from './precedence.js';

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  readonly scanner: ScannerState;
  /** The single token of lookahead */
  current: Token;
  readonly precedence: PrecedenceTable;
}

/** Create parser state and read the first token */
export function createParserState(
  scanner: ScannerState,
  precedence: PrecedenceTable
): ParserState {
  return {
    scanner,
    current: nextToken(scanner),
    precedence,
  };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** @internal */
export function current(state: ParserState): Token {
  return state.current;
}

/** Consume the current token and return it. @internal */
export function advance(state: ParserState): Token {
  const token = state.current;
  state.current = nextToken(state.scanner);
  return token;
}

/** @internal */
export function checkChar(state: ParserState, ch: string): boolean {
  const token = state.current;
  return token.type === 'CHAR' && token.value === ch;
}

/**
 * Precedence of the current token as a binary operator.
 * Only single-character tokens can be operators.
 * @internal
 */
export function tokenPrecedence(state: ParserState): number {
  const token = state.current;
  if (token.type !== 'CHAR') return NOT_AN_OPERATOR;
  return state.precedence.precedenceOf(token.value);
}
