/**
 * CLI Error Enrichment
 * Source excerpts and "did you mean" hints for calx diagnostics
 */

import { ERROR_REGISTRY, type CalxError, type SourceLocation } from '@calx/core';

/** Source lines around the point a diagnostic refers to */
export interface SourceExcerpt {
  /** Line number of `lines[0]` */
  readonly firstLine: number;
  readonly lines: readonly string[];
  readonly location: SourceLocation;
}

export interface EnrichedError {
  readonly errorId: string;
  /** Message without the ` at line:col` suffix */
  readonly message: string;
  /** Name of the input: a file path, <eval>, <stdin> or <repl> */
  readonly sourceName?: string | undefined;
  readonly location?: SourceLocation | undefined;
  readonly excerpt?: SourceExcerpt | undefined;
  readonly suggestions?: readonly string[] | undefined;
  /** Registry explanation of the cause, shown in verbose output */
  readonly note?: string | undefined;
}

/** What the CLI knows about the input an error came from */
export interface ErrorInput {
  readonly source: string;
  readonly sourceName?: string | undefined;
  /** Functions the module held when the error was reported */
  readonly functionNames?: readonly string[] | undefined;
}

const MAX_EDIT_DISTANCE = 2;
const MAX_SUGGESTIONS = 3;

// ============================================================
// EXCERPTS
// ============================================================

/**
 * Lines `radius` above and below `location`, or undefined when the source
 * has no such line.
 */
export function excerptAround(
  source: string,
  location: SourceLocation,
  radius = 2
): SourceExcerpt | undefined {
  const lines = source.split(/\r\n|\n|\r/);
  if (source === '' || location.line < 1 || location.line > lines.length) {
    return undefined;
  }
  const firstLine = Math.max(1, location.line - radius);
  return {
    firstLine,
    lines: lines.slice(firstLine - 1, location.line + radius),
    location,
  };
}

// ============================================================
// SUGGESTIONS
// ============================================================

/**
 * Edit distance between `a` and `b`, or `limit + 1` as soon as every
 * alignment costs more than `limit`.
 */
function boundedEditDistance(a: string, b: string, limit: number): number {
  if (Math.abs(a.length - b.length) > limit) return limit + 1;

  let previous = [...Array(b.length + 1).keys()];
  for (let i = 1; i <= a.length; i++) {
    const row = [i];
    let best = i;
    for (let j = 1; j <= b.length; j++) {
      const substitution = (previous[j - 1] ?? 0) + (a[i - 1] === b[j - 1] ? 0 : 1);
      const cost = Math.min(substitution, (previous[j] ?? 0) + 1, (row[j - 1] ?? 0) + 1);
      row.push(cost);
      best = Math.min(best, cost);
    }
    if (best > limit) return limit + 1;
    previous = row;
  }
  return previous[b.length] ?? limit + 1;
}

/**
 * Names within two edits of `name`, nearest first, ties alphabetical,
 * at most three.
 */
export function suggestSimilarNames(name: string, known: readonly string[]): string[] {
  if (name === '') return [];

  const distances = new Map<string, number>();
  for (const candidate of known) {
    if (candidate === name || distances.has(candidate)) continue;
    const distance = boundedEditDistance(name, candidate, MAX_EDIT_DISTANCE);
    if (distance <= MAX_EDIT_DISTANCE) distances.set(candidate, distance);
  }

  return [...distances]
    .sort(([a, da], [b, db]) => da - db || a.localeCompare(b))
    .slice(0, MAX_SUGGESTIONS)
    .map(([candidate]) => candidate);
}

/**
 * Names an unknown-name error could have meant: the enclosing function's
 * parameters for a variable, the module's functions for a callee.
 */
function knownNames(error: CalxError, input: ErrorInput): readonly string[] {
  switch (error.errorId) {
    case 'CALX-G001': {
      const candidates = error.context['candidates'];
      return Array.isArray(candidates)
        ? candidates.filter((item): item is string => typeof item === 'string')
        : [];
    }
    case 'CALX-G003':
      return input.functionNames ?? [];
    default:
      return [];
  }
}

// ============================================================
// ENRICHMENT
// ============================================================

export function enrichError(
  error: CalxError,
  input: ErrorInput = { source: '' }
): EnrichedError {
  const { location } = error;
  const name = error.context['name'];
  const similar =
    typeof name === 'string' ? suggestSimilarNames(name, knownNames(error, input)) : [];

  return {
    errorId: error.errorId,
    message: error.toData().message,
    sourceName: input.sourceName,
    location,
    excerpt: location ? excerptAround(input.source, location) : undefined,
    suggestions:
      similar.length > 0 ? similar.map((candidate) => `did you mean '${candidate}'?`) : undefined,
    note: ERROR_REGISTRY.get(error.errorId)?.cause,
  };
}
