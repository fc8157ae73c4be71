// ============================================================
// SOURCE LOCATION
// ============================================================

/** 1-based line and column, 0-based character offset */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

export const START_OF_INPUT: SourceLocation = { line: 1, column: 1, offset: 0 };

export function makeSpan(
  start: SourceLocation,
  end: SourceLocation
): SourceSpan {
  return { start, end };
}
