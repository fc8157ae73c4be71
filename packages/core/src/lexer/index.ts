/**
 * Scanner Module
 * Converts a character stream into tokens
 */

export { stringSource, type CharSource } from './source.js';
export { createScannerState, type ScannerState } from './state.js';
export { createScanner, nextToken, tokenize } from './tokenizer.js';
export { parseDecimal } from './readers.js';
