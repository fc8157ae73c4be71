/**
 * CLI Argument Parsing
 */

import { isOutputFormat, type OutputFormat } from './cli-error-formatter.js';

/** Where the program text comes from */
export type InputSource =
  | { kind: 'file'; path: string }
  | { kind: 'eval'; code: string }
  | { kind: 'stdin' }
  /** No input named: REPL on a terminal, stdin otherwise */
  | { kind: 'default' };

/** Flags given on the command line; unset flags defer to the config file */
export interface CliFlags {
  configPath?: string | undefined;
  evaluate?: boolean | undefined;
  printModule?: boolean | undefined;
  format?: OutputFormat | undefined;
  verbose?: boolean | undefined;
}

export type ParsedArgs =
  | { mode: 'help' | 'version' }
  | { mode: 'explain'; errorId: string }
  | { mode: 'run'; input: InputSource; flags: CliFlags };

export const USAGE = `Usage:
  calx <file>             Compile and run a calx source file
  calx -e <code>          Compile and run inline code
  calx -                  Read source from stdin
  calx                    Start the interactive prompt (.exit to quit)
  calx --explain CALX-XXXX  Show error documentation

Options:
  --config <path>         Configuration file (default: ./calx.config.yaml)
  --no-eval               Print top-level expressions instead of evaluating them
  --print-module          Print the module after all input is processed
  --format <format>       Error format: human, json, compact (default: human)
  --verbose               Print IR as it is produced and explain errors
  -h, --help              Show this help message
  -v, --version           Show version information

Examples:
  calx -e "def sq(x) x*x; sq(4);"
  calx --print-module --no-eval program.calx
  calx --explain CALX-G003`;

const VALUE_FLAGS = new Set(['--config', '--format', '--explain', '-e']);
const BOOLEAN_FLAGS = new Set(['--no-eval', '--print-module', '--verbose']);

/**
 * Parse command-line arguments into a structured command.
 *
 * @param argv - typically process.argv.slice(2)
 * @throws Error for unknown options, missing values and extra inputs
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  const flags: CliFlags = {};
  const inputs: InputSource[] = [];
  let explain: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    if (VALUE_FLAGS.has(arg)) {
      const value = argv[i + 1];
      if (value === undefined) {
        throw new Error(`Missing value after ${arg}`);
      }
      i++;

      switch (arg) {
        case '--config':
          flags.configPath = value;
          break;
        case '--format':
          if (!isOutputFormat(value)) {
            throw new Error(
              `Invalid --format value: ${value}. Must be one of: human, json, compact`
            );
          }
          flags.format = value;
          break;
        case '--explain':
          explain = value;
          break;
        case '-e':
          inputs.push({ kind: 'eval', code: value });
          break;
      }
      continue;
    }

    if (BOOLEAN_FLAGS.has(arg)) {
      if (arg === '--no-eval') flags.evaluate = false;
      if (arg === '--print-module') flags.printModule = true;
      if (arg === '--verbose') flags.verbose = true;
      continue;
    }

    if (arg === '-') {
      inputs.push({ kind: 'stdin' });
      continue;
    }

    if (arg.startsWith('-')) {
      throw new Error(`Unknown option: ${arg}`);
    }

    inputs.push({ kind: 'file', path: arg });
  }

  if (explain !== undefined) {
    return { mode: 'explain', errorId: explain };
  }

  if (inputs.length > 1) {
    throw new Error('Only one input may be given');
  }

  return { mode: 'run', input: inputs[0] ?? { kind: 'default' }, flags };
}
