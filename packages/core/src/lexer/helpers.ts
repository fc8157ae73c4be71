/**
 * Scanner Helper Functions
 * Character classification and token construction
 */

import type { SourceLocation, Token } from '../types.js';
import { makeSpan } from '../types.js';

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

export function isLetter(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z');
}

export function isAlphanumeric(ch: string): boolean {
  return isLetter(ch) || isDigit(ch);
}

export function isNumberChar(ch: string): boolean {
  return isDigit(ch) || ch === '.';
}

export function isWhitespace(ch: string): boolean {
  return (
    ch === ' ' ||
    ch === '\t' ||
    ch === '\n' ||
    ch === '\r' ||
    ch === '\v' ||
    ch === '\f'
  );
}

export function isLineEnd(ch: string): boolean {
  return ch === '\n' || ch === '\r';
}

export function makeCharToken(
  value: string,
  start: SourceLocation,
  end: SourceLocation
): Token {
  return { type: 'CHAR', value, span: makeSpan(start, end) };
}
