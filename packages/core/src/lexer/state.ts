/**
 * Scanner State
 * Holds the single pending character and its position
 */

import type { SourceLocation } from '../types.js';
import type { CharSource } from './source.js';

export interface ScannerState {
  readonly source: CharSource;
  /** Pending character; '' once the input is exhausted */
  lastChar: string;
  /** Position of lastChar */
  line: number;
  column: number;
  offset: number;
}

export function createScannerState(source: CharSource): ScannerState {
  return {
    source,
    lastChar: source.read(),
    line: 1,
    column: 1,
    offset: 0,
  };
}

export function currentLocation(state: ScannerState): SourceLocation {
  return { line: state.line, column: state.column, offset: state.offset };
}

export function peek(state: ScannerState): string {
  return state.lastChar;
}

export function isAtEnd(state: ScannerState): boolean {
  return state.lastChar === '';
}

/** Consume the pending character and read the next one */
export function advance(state: ScannerState): string {
  const ch = state.lastChar;
  if (ch === '') return ch;

  // offsets count UTF-16 units, columns count characters
  state.offset += ch.length;
  if (ch === '\n') {
    state.line++;
    state.column = 1;
  } else {
    state.column++;
  }
  state.lastChar = state.source.read();
  return ch;
}
