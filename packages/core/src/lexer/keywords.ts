/**
 * Keyword Lookup Table
 */

import type { KeywordToken } from '../types.js';

export const KEYWORDS: ReadonlyMap<string, KeywordToken['type']> = new Map<string, KeywordToken['type']>([
  ['def', 'DEF'],
  ['extern', 'EXTERN'],
]);
