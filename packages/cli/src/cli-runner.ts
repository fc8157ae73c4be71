/**
 * CLI Runner
 * A session whose callbacks write formatted results and errors
 */

import {
  ANON_FUNCTION_NAME,
  createSession,
  runSource,
  type CalxError,
  type Session,
  type SessionReport,
} from '@calx/core';
import type { ResolvedOptions } from './cli-config.js';
import { enrichError } from './cli-error-enrichment.js';
import { formatError } from './cli-error-formatter.js';

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

export const processIO: CliIO = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
};

/** Render an evaluated value for stdout */
export function formatValue(value: number): string {
  return String(value);
}

/**
 * Runs inputs against one shared session.
 *
 * Values go to stdout; errors, and the IR of each construct in verbose
 * mode, go to stderr.
 */
export class CliRunner {
  readonly session: Session;
  /** Errors reported across all inputs */
  errorCount = 0;
  private source = '';
  private sourceName = '';

  constructor(
    readonly options: ResolvedOptions,
    private readonly io: CliIO = processIO
  ) {
    this.session = createSession({
      precedence: options.precedence,
      evaluate: options.evaluate,
      callbacks: {
        onDefinition: (event) => {
          if (options.verbose) {
            io.stderr(`Read function definition:\n${event.ir}\n`);
          }
        },
        onExtern: (event) => {
          if (options.verbose) {
            io.stderr(`Read extern:\n${event.ir}\n`);
          }
        },
        onTopLevel: (event) => {
          if (event.value === undefined) {
            io.stdout(`${event.ir}\n`);
            return;
          }
          if (options.verbose) {
            io.stderr(`Read top-level expression:\n${event.ir}\n`);
          }
          io.stdout(`${formatValue(event.value)}\n`);
        },
        onError: (error) => this.reportError(error),
        onOutput: (text) => io.stdout(text),
      },
    });
  }

  /** Process one input; `sourceName` labels error locations */
  run(source: string, sourceName: string): SessionReport {
    this.source = source;
    this.sourceName = sourceName;
    return runSource(this.session, source);
  }

  /** Write the module when printModule is set */
  finish(): void {
    if (this.options.printModule) {
      this.io.stdout(this.session.module.print());
    }
  }

  reportError(error: CalxError): void {
    this.errorCount++;
    const enriched = enrichError(error, {
      source: this.source,
      sourceName: this.sourceName,
      functionNames: this.session.module
        .list()
        .map((fn) => fn.name)
        .filter((name) => name !== ANON_FUNCTION_NAME),
    });
    this.io.stderr(`${formatError(enriched, this.options)}\n`);
  }
}
