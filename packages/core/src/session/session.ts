/**
 * Session Factory
 *
 * Bundles the state one stream of input is processed against: module,
 * operator table, lowering pass, interpreter and callbacks.
 */

import { createHostFunctions, Interpreter, IRModule } from '../ir/index.js';
import type { HostFunction, IRFunction, IRValue } from '../ir/index.js';
import { Lowering } from '../lowering/index.js';
import { PrecedenceTable } from '../parser/index.js';
import { defaultCallbacks, type SessionCallbacks } from './callbacks.js';

export interface SessionOptions {
  /** Operator table, or overrides merged over the defaults */
  precedence?: PrecedenceTable | Readonly<Record<string, number>> | undefined;
  /** Evaluate top-level expressions (default: true) */
  evaluate?: boolean | undefined;
  /** Callbacks replacing the defaults individually */
  callbacks?: Partial<SessionCallbacks> | undefined;
  /** Extra host functions; these win over the standard library */
  hostFunctions?: Readonly<Record<string, HostFunction>> | undefined;
  /** Interpreter call depth limit */
  maxCallDepth?: number | undefined;
}

export interface Session {
  readonly module: IRModule;
  readonly precedence: PrecedenceTable;
  readonly lowering: Lowering<IRFunction, IRValue>;
  readonly interpreter: Interpreter;
  readonly callbacks: SessionCallbacks;
  readonly evaluate: boolean;
}

/**
 * Create a session with an empty module.
 *
 * @throws ConfigError (CALX-C002) for invalid precedence overrides
 */
export function createSession(options: SessionOptions = {}): Session {
  const callbacks: SessionCallbacks = {
    ...defaultCallbacks,
    ...options.callbacks,
  };

  const precedence =
    options.precedence instanceof PrecedenceTable
      ? options.precedence
      : PrecedenceTable.withDefaults(options.precedence);

  const module = new IRModule();
  const interpreter = new Interpreter(module, {
    hostFunctions: {
      ...createHostFunctions((text) => callbacks.onOutput(text)),
      ...options.hostFunctions,
    },
    maxCallDepth: options.maxCallDepth,
  });

  return {
    module,
    precedence,
    lowering: new Lowering(module),
    interpreter,
    callbacks,
    evaluate: options.evaluate ?? true,
  };
}
