/**
 * Token Readers
 * Functions to read specific token kinds from the pending character on
 */

import type { Token } from '../types.js';
import { makeSpan } from '../types.js';
import { isAlphanumeric, isDigit, isLineEnd, isNumberChar } from './helpers.js';
import { KEYWORDS } from './keywords.js';
import {
  advance,
  currentLocation,
  isAtEnd,
  peek,
  type ScannerState,
} from './state.js';

export function readIdentifier(state: ScannerState): Token {
  const start = currentLocation(state);
  let value = advance(state);

  while (isAlphanumeric(peek(state))) {
    value += advance(state);
  }

  const span = makeSpan(start, currentLocation(state));
  const keyword = KEYWORDS.get(value);
  if (keyword !== undefined) {
    return { type: keyword, span };
  }
  return { type: 'IDENTIFIER', value, span };
}

/**
 * Digits and at most one '.'; a second '.' ends the literal and stays
 * pending.
 */
export function readNumber(state: ScannerState): Token {
  const start = currentLocation(state);
  let text = '';
  let seenPoint = false;

  while (isNumberChar(peek(state))) {
    if (peek(state) === '.') {
      if (seenPoint) break;
      seenPoint = true;
    }
    text += advance(state);
  }

  return {
    type: 'NUMBER',
    value: parseDecimal(text),
    text,
    span: makeSpan(start, currentLocation(state)),
  };
}

/** Decimal text to float64; text without digits (a lone '.') is 0 */
export function parseDecimal(text: string): number {
  if (![...text].some(isDigit)) return 0;
  return Number.parseFloat(text);
}

/** Discard a '#' comment up to (not including) the line end */
export function skipComment(state: ScannerState): void {
  while (!isAtEnd(state) && !isLineEnd(peek(state))) {
    advance(state);
  }
}
