/**
 * Calx Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import type { SourceLocation } from './source-location.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface CalxErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

function lookupDefinition(
  errorId: string,
  category?: ErrorCategory
): ErrorDefinition {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (category !== undefined && definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
  return definition;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all Calx errors.
 * Provides structured data for host applications to format as needed.
 */
export class CalxError extends Error {
  readonly errorId: string;
  readonly category: ErrorCategory;
  readonly location?: SourceLocation | undefined;
  readonly context: Record<string, unknown>;

  constructor(data: CalxErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    const definition = lookupDefinition(data.errorId);

    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'CalxError';
    this.errorId = data.errorId;
    this.category = definition.category;
    this.location = data.location;
    this.context = data.context ?? {};
  }

  /** Get structured error data for custom formatting */
  toData(): CalxErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''),
      location: this.location,
      context: this.context,
    };
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Create an error from the registry, rendering its message template.
 *
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError('CALX-G001', { name: 'y' }, location)
 * // CalxError: "unknown variable name: y at 1:10"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location?: SourceLocation | undefined
): CalxError {
  const definition = lookupDefinition(errorId);
  return new CalxError({
    errorId,
    message: renderMessage(definition.messageTemplate, context),
    location,
    context,
  });
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Syntax errors; always located at the offending token */
export class ParseError extends CalxError {
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    context: Record<string, unknown>,
    location: SourceLocation
  ) {
    const definition = lookupDefinition(errorId, 'parse');
    super({
      errorId,
      message: renderMessage(definition.messageTemplate, context),
      location,
      context,
    });
    this.name = 'ParseError';
    this.location = location;
  }
}

/** Semantic errors found while lowering an AST into the target module */
export class LoweringError extends CalxError {
  constructor(
    errorId: string,
    context: Record<string, unknown>,
    location?: SourceLocation
  ) {
    const definition = lookupDefinition(errorId, 'lowering');
    super({
      errorId,
      message: renderMessage(definition.messageTemplate, context),
      location,
      context,
    });
    this.name = 'LoweringError';
  }

  /** Create from an AST node */
  static fromNode(
    errorId: string,
    node: { span: { start: SourceLocation } },
    context: Record<string, unknown>
  ): LoweringError {
    return new LoweringError(errorId, context, node.span.start);
  }
}

/** Misuse of the IR module API */
export class ModuleError extends CalxError {
  constructor(errorId: string, context: Record<string, unknown>) {
    const definition = lookupDefinition(errorId, 'module');
    super({
      errorId,
      message: renderMessage(definition.messageTemplate, context),
      context,
    });
    this.name = 'ModuleError';
  }
}

/** Failures while executing IR */
export class ExecutionError extends CalxError {
  constructor(errorId: string, context: Record<string, unknown>) {
    const definition = lookupDefinition(errorId, 'runtime');
    super({
      errorId,
      message: renderMessage(definition.messageTemplate, context),
      context,
    });
    this.name = 'ExecutionError';
  }
}

/** Invalid configuration values */
export class ConfigError extends CalxError {
  constructor(errorId: string, context: Record<string, unknown>) {
    const definition = lookupDefinition(errorId, 'config');
    super({
      errorId,
      message: renderMessage(definition.messageTemplate, context),
      context,
    });
    this.name = 'ConfigError';
  }
}
