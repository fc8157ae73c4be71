/**
 * Driver Loop
 * Dispatches top-level constructs until end of input
 */

import { createParser, type Parser } from '../parser/index.js';
import type { CharSource } from '../lexer/index.js';
import { ANON_FUNCTION_NAME, CalxError } from '../types.js';
import type { Session } from './session.js';

/** What one call to runSource produced */
export interface SessionReport {
  /** Names of functions defined, in order */
  readonly definitions: string[];
  /** Names of externs declared, in order */
  readonly externs: string[];
  /** Values of evaluated top-level expressions, in order */
  readonly values: number[];
  readonly errors: CalxError[];
}

/**
 * Process every top-level construct of `source` against the session.
 *
 * Errors are reported through `onError` and collected; after a syntax
 * error one token is skipped and parsing resumes.
 *
 * @example
 * ```typescript
 * const session = createSession({ callbacks: { onTopLevel: () => {} } });
 * runSource(session, 'def add(a b) a+b; add(1, 2);').values; // [3]
 * ```
 */
export function runSource(
  session: Session,
  source: string | CharSource
): SessionReport {
  const parser = createParser(source, { precedence: session.precedence });
  const report: SessionReport = {
    definitions: [],
    externs: [],
    values: [],
    errors: [],
  };

  for (;;) {
    const token = parser.current;
    if (token.type === 'EOF') break;

    if (token.type === 'CHAR' && token.value === ';') {
      parser.advance();
      continue;
    }

    switch (token.type) {
      case 'DEF':
        handleDefinition(session, parser, report);
        break;
      case 'EXTERN':
        handleExtern(session, parser, report);
        break;
      default:
        handleTopLevelExpression(session, parser, report);
        break;
    }
  }

  return report;
}

function reportError(
  session: Session,
  report: SessionReport,
  error: CalxError
): void {
  report.errors.push(error);
  session.callbacks.onError(error);
}

// ============================================================
// HANDLERS
// ============================================================

function handleDefinition(
  session: Session,
  parser: Parser,
  report: SessionReport
): void {
  const parsed = parser.parseDefinition();
  if (!parsed.ok) {
    reportError(session, report, parsed.error);
    parser.advance();
    return;
  }

  const lowered = session.lowering.lowerFunction(parsed.value);
  if (!lowered.ok) {
    reportError(session, report, lowered.error);
    return;
  }

  const name = parsed.value.prototype.name;
  report.definitions.push(name);
  session.callbacks.onDefinition({
    name,
    node: parsed.value,
    ir: session.module.printFunction(lowered.value),
  });
}

function handleExtern(
  session: Session,
  parser: Parser,
  report: SessionReport
): void {
  const parsed = parser.parseExtern();
  if (!parsed.ok) {
    reportError(session, report, parsed.error);
    parser.advance();
    return;
  }

  const lowered = session.lowering.lowerPrototype(parsed.value);
  if (!lowered.ok) {
    reportError(session, report, lowered.error);
    return;
  }

  report.externs.push(parsed.value.name);
  session.callbacks.onExtern({
    name: parsed.value.name,
    node: parsed.value,
    ir: session.module.printFunction(lowered.value),
  });
}

function handleTopLevelExpression(
  session: Session,
  parser: Parser,
  report: SessionReport
): void {
  const parsed = parser.parseTopLevelExpr();
  if (!parsed.ok) {
    reportError(session, report, parsed.error);
    parser.advance();
    return;
  }

  const lowered = session.lowering.lowerFunction(parsed.value);
  if (!lowered.ok) {
    reportError(session, report, lowered.error);
    return;
  }

  const fn = lowered.value;
  const ir = session.module.printFunction(fn);
  let value: number | undefined;
  try {
    if (session.evaluate) {
      value = session.interpreter.run(ANON_FUNCTION_NAME);
    }
  } catch (error) {
    if (!(error instanceof CalxError)) throw error;
    reportError(session, report, error);
    return;
  } finally {
    session.module.eraseFunction(fn);
  }

  if (value !== undefined) report.values.push(value);
  session.callbacks.onTopLevel({ node: parsed.value, ir, value });
}
