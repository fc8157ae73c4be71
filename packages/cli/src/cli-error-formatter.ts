/**
 * CLI Error Formatter
 * Format enriched errors for human-readable, JSON, or compact output
 */

import type { SourceLocation } from '@calx/core';
import type { EnrichedError } from './cli-error-enrichment.js';

// ============================================================
// PUBLIC TYPES
// ============================================================

export type OutputFormat = 'human' | 'json' | 'compact';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['human', 'json', 'compact'];

export function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'human' || value === 'json' || value === 'compact';
}

export interface FormatOptions {
  readonly format: OutputFormat;
  readonly verbose: boolean;
}

// ============================================================
// ERROR FORMATTING
// ============================================================

/**
 * Format an enriched error for output.
 *
 * - human: multi-line with snippet and caret underline
 * - json: LSP Diagnostic compatible
 * - compact: single line for CI output
 *
 * @throws {TypeError} Unknown format
 */
export function formatError(error: EnrichedError, options: FormatOptions): string {
  switch (options.format) {
    case 'json':
      return formatErrorJson(error, options);
    case 'compact':
      return formatErrorCompact(error);
    case 'human':
      return formatErrorHuman(error, options);
    default:
      throw new TypeError(`Unknown format: ${String(options.format)}`);
  }
}

/**
 * Output format:
 * ```
 * error[CALX-G001]: unknown variable name: y
 *   --> demo.calx:1:10
 *    |
 *  1 | def f(x) y
 *    |          ^
 *    |
 *    = help: did you mean 'x'?
 * ```
 */
function formatErrorHuman(error: EnrichedError, options: FormatOptions): string {
  const lines = [`error[${error.errorId}]: ${error.message}`];

  if (error.location) {
    lines.push(`  --> ${locate(error, error.location)}`);
  }

  const { excerpt } = error;
  if (excerpt && excerpt.lines.length > 0) {
    const width = String(excerpt.firstLine + excerpt.lines.length - 1).length;
    const gutter = ' '.repeat(width);

    lines.push(` ${gutter} |`);
    excerpt.lines.forEach((content, index) => {
      const lineNumber = excerpt.firstLine + index;
      lines.push(` ${String(lineNumber).padStart(width)} | ${content}`);
      if (lineNumber === excerpt.location.line) {
        lines.push(` ${gutter} | ${' '.repeat(excerpt.location.column - 1)}^`);
      }
    });
    lines.push(` ${gutter} |`);
  }

  for (const suggestion of error.suggestions ?? []) {
    lines.push(`   = help: ${suggestion}`);
  }

  if (options.verbose && error.note) {
    lines.push(`   = note: ${error.note}`);
  }

  return lines.join('\n');
}

/** `name:line:col`, or `line:col` for unnamed input */
function locate(error: EnrichedError, location: SourceLocation): string {
  const prefix = error.sourceName ? `${error.sourceName}:` : '';
  return `${prefix}${location.line}:${location.column}`;
}

interface DiagnosticPosition {
  line: number;
  character: number;
}

interface Diagnostic {
  errorId: string;
  severity: number;
  message: string;
  range?: { start: DiagnosticPosition; end: DiagnosticPosition };
  source: string;
  code: string;
  suggestions?: readonly string[];
  note?: string;
}

/** LSP positions are 0-based in both line and character */
function toPosition(location: { line: number; column: number }): DiagnosticPosition {
  return { line: location.line - 1, character: location.column - 1 };
}

function formatErrorJson(error: EnrichedError, options: FormatOptions): string {
  const diagnostic: Diagnostic = {
    errorId: error.errorId,
    severity: 1, // LSP: 1 = Error
    message: error.message,
    source: 'calx',
    code: error.errorId,
  };

  if (error.location) {
    const position = toPosition(error.location);
    diagnostic.range = { start: position, end: position };
  }

  if (error.suggestions && error.suggestions.length > 0) {
    diagnostic.suggestions = error.suggestions;
  }

  if (options.verbose && error.note) {
    diagnostic.note = error.note;
  }

  return JSON.stringify(diagnostic, null, 2);
}

function formatErrorCompact(error: EnrichedError): string {
  const parts: string[] = [`[${error.errorId}]`, error.message];

  if (error.location) {
    parts.push(`at ${locate(error, error.location)}`);
  }

  const hint = error.suggestions?.[0];
  if (hint !== undefined) {
    parts.push(`(hint: ${hint})`);
  }

  return parts.join(' ');
}
