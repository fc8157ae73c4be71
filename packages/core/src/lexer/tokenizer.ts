/**
 * Scanner
 * Main tokenization logic
 */

import type { Token } from '../types.js';
import { makeSpan } from '../types.js';
import { isLetter, isNumberChar, isWhitespace, makeCharToken } from './helpers.js';
import { readIdentifier, readNumber, skipComment } from './readers.js';
import { stringSource, type CharSource } from './source.js';
import {
  advance,
  createScannerState,
  currentLocation,
  isAtEnd,
  peek,
  type ScannerState,
} from './state.js';

function skipWhitespace(state: ScannerState): void {
  while (isWhitespace(peek(state))) {
    advance(state);
  }
}

/**
 * Scan the next token. Never throws; once the input is exhausted every
 * call returns EOF.
 */
export function nextToken(state: ScannerState): Token {
  for (;;) {
    skipWhitespace(state);

    if (peek(state) !== '#') break;
    skipComment(state);
  }

  const start = currentLocation(state);

  if (isAtEnd(state)) {
    return { type: 'EOF', span: makeSpan(start, start) };
  }

  const ch = peek(state);

  // Identifier or keyword
  if (isLetter(ch)) {
    return readIdentifier(state);
  }

  // Number (a leading '.' starts one too)
  if (isNumberChar(ch)) {
    return readNumber(state);
  }

  advance(state);
  return makeCharToken(ch, start, currentLocation(state));
}

/** Create a scanner over a string or a custom character source */
export function createScanner(source: string | CharSource): ScannerState {
  return createScannerState(
    typeof source === 'string' ? stringSource(source) : source
  );
}

/** Scan all tokens up to and including EOF */
export function tokenize(source: string | CharSource): Token[] {
  const state = createScanner(source);
  const tokens: Token[] = [];
  let token: Token;

  do {
    token = nextToken(state);
    tokens.push(token);
  } while (token.type !== 'EOF');

  return tokens;
}
