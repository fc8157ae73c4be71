/**
 * Test Helpers: captured CLI output
 */

import type { CliIO } from '../../src/cli-runner.js';

export interface CapturedIO extends CliIO {
  readonly out: string[];
  readonly err: string[];
}

export function captureIO(): CapturedIO {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (text) => {
      out.push(text);
    },
    stderr: (text) => {
      err.push(text);
    },
  };
}
