#!/usr/bin/env tsx
/**
 * Calx CLI - Compile and run calx programs from the command line
 *
 * Usage:
 *   npx tsx src/cli.ts program.calx
 *   npx tsx src/cli.ts -e "def sq(x) x*x; sq(4);"
 *   echo "1+2;" | npx tsx src/cli.ts -
 *   npx tsx src/cli.ts            (interactive prompt)
 */

import { existsSync, readFileSync } from 'node:fs';
import { createInterface } from 'node:readline';
import { CalxError, VERSION } from '@calx/core';
import { parseArgs, USAGE, type InputSource } from './cli-args.js';
import { loadConfig, resolveOptions } from './cli-config.js';
import { enrichError } from './cli-error-enrichment.js';
import { formatError, type FormatOptions } from './cli-error-formatter.js';
import { explainError } from './cli-explain.js';
import { CliRunner, processIO, type CliIO } from './cli-runner.js';

export interface MainOptions {
  io?: CliIO | undefined;
  /** Directory searched for calx.config.yaml */
  cwd?: string | undefined;
  /** Read all of stdin; defaults to file descriptor 0 */
  readStdin?: (() => string) | undefined;
  /** Whether stdin is a terminal, selecting the REPL for no input */
  isTTY?: boolean | undefined;
}

const PROMPT = 'ready> ';

async function repl(runner: CliRunner): Promise<void> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: PROMPT,
  });

  rl.prompt();
  for await (const line of rl) {
    if (line.trim() === '.exit') break;
    runner.run(line, '<repl>');
    rl.prompt();
  }
  rl.close();
}

function readInput(
  input: Exclude<InputSource, { kind: 'default' }>,
  readStdin: () => string
): { source: string; name: string } {
  switch (input.kind) {
    case 'eval':
      return { source: input.code, name: '<eval>' };
    case 'stdin':
      return { source: readStdin(), name: '<stdin>' };
    case 'file':
      if (!existsSync(input.path)) {
        throw new Error(`File not found: ${input.path}`);
      }
      return { source: readFileSync(input.path, 'utf-8'), name: input.path };
  }
}

/**
 * Entry point for the calx binary.
 *
 * @returns exit code: 1 when any error was reported, else 0
 */
export async function main(argv: readonly string[], options: MainOptions = {}): Promise<number> {
  const io = options.io ?? processIO;
  const readStdin = options.readStdin ?? (() => readFileSync(0, 'utf-8'));
  let formatOptions: FormatOptions = { format: 'human', verbose: false };

  try {
    const parsed = parseArgs(argv);

    switch (parsed.mode) {
      case 'help':
        io.stdout(`${USAGE}\n`);
        return 0;

      case 'version':
        io.stdout(`${VERSION}\n`);
        return 0;

      case 'explain': {
        const documentation = explainError(parsed.errorId);
        if (documentation === null) {
          io.stderr(`Invalid error ID: ${parsed.errorId}\n`);
          io.stderr('Error ID must be in format CALX-{P|G|M|R|C}{3-digit}, e.g., CALX-G003\n');
          return 1;
        }
        io.stdout(`${documentation}\n`);
        return 0;
      }

      case 'run': {
        formatOptions = {
          format: parsed.flags.format ?? 'human',
          verbose: parsed.flags.verbose ?? false,
        };
        const config = loadConfig(parsed.flags.configPath, options.cwd);
        const resolved = resolveOptions(parsed.flags, config);
        const runner = new CliRunner(resolved, io);

        const input = parsed.input;
        if (input.kind === 'default' && (options.isTTY ?? process.stdin.isTTY === true)) {
          await repl(runner);
        } else {
          const { source, name } = readInput(
            input.kind === 'default' ? { kind: 'stdin' } : input,
            readStdin
          );
          runner.run(source, name);
        }

        runner.finish();
        return runner.errorCount > 0 ? 1 : 0;
      }
    }
  } catch (error) {
    if (error instanceof CalxError) {
      io.stderr(`${formatError(enrichError(error), formatOptions)}\n`);
      return 1;
    }
    if (error instanceof Error) {
      io.stderr(`${error.message}\n`);
      return 1;
    }
    throw error;
  }
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    }
  );
}
