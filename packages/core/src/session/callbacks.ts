/**
 * Session Callbacks
 * Reporting hooks for the driver loop
 */

import type { CalxError, FunctionNode, PrototypeNode } from '../types.js';

export interface DefinitionEvent {
  readonly name: string;
  readonly node: FunctionNode;
  /** Printed IR of the lowered function */
  readonly ir: string;
}

export interface ExternEvent {
  readonly name: string;
  readonly node: PrototypeNode;
  readonly ir: string;
}

export interface TopLevelEvent {
  readonly node: FunctionNode;
  readonly ir: string;
  /** Undefined when evaluation is disabled */
  readonly value: number | undefined;
}

/** I/O callbacks for a session */
export interface SessionCallbacks {
  /** Called after a `def` is lowered */
  onDefinition: (event: DefinitionEvent) => void;
  /** Called after an `extern` is declared */
  onExtern: (event: ExternEvent) => void;
  /** Called after a top-level expression is lowered (and evaluated) */
  onTopLevel: (event: TopLevelEvent) => void;
  /** Called for every parse, lowering or runtime error */
  onError: (error: CalxError) => void;
  /** Text written by host functions such as putchard and printd */
  onOutput: (text: string) => void;
}

export const defaultCallbacks: SessionCallbacks = {
  onDefinition: (event) => {
    console.error(`Read function definition:\n${event.ir}`);
  },
  onExtern: (event) => {
    console.error(`Read extern:\n${event.ir}`);
  },
  onTopLevel: (event) => {
    if (event.value === undefined) {
      console.error(`Read top-level expression:\n${event.ir}`);
    } else {
      console.error(`Evaluated to ${event.value.toFixed(6)}`);
    }
  },
  onError: (error) => {
    console.error(`Error: ${error.message}`);
  },
  onOutput: (text) => {
    process.stdout.write(text);
  },
};
