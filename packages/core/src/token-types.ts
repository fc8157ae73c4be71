import type { SourceSpan } from './source-location.js';

// ============================================================
// TOKEN TYPES
// ============================================================

interface BaseToken {
  readonly span: SourceSpan;
}

export interface EofToken extends BaseToken {
  readonly type: 'EOF';
}

export interface KeywordToken extends BaseToken {
  readonly type: 'DEF' | 'EXTERN';
}

export interface IdentifierToken extends BaseToken {
  readonly type: 'IDENTIFIER';
  readonly value: string;
}

export interface NumberToken extends BaseToken {
  readonly type: 'NUMBER';
  readonly value: number;
  /** Characters actually scanned for this literal */
  readonly text: string;
}

/** Any other single character: operators, parens, comma, semicolon */
export interface CharToken extends BaseToken {
  readonly type: 'CHAR';
  readonly value: string;
}

export type Token =
  | EofToken
  | KeywordToken
  | IdentifierToken
  | NumberToken
  | CharToken;

/** Source text of a token, for diagnostics */
export function describeToken(token: Token): string {
  switch (token.type) {
    case 'EOF':
      return 'end of input';
    case 'DEF':
      return "'def'";
    case 'EXTERN':
      return "'extern'";
    case 'IDENTIFIER':
      return `identifier '${token.value}'`;
    case 'NUMBER':
      return `number '${token.text}'`;
    case 'CHAR':
      return `'${token.value}'`;
  }
}
