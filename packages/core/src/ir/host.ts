/**
 * Host Functions
 * Native implementations callers can bind to `extern` declarations
 */

export type HostFunction = (...args: number[]) => number;

/**
 * Standard host library.
 *
 * `putchard` writes one character and `printd` one number per line, both
 * through `write`; every function returns a number.
 */
export function createHostFunctions(
  write: (text: string) => void
): Record<string, HostFunction> {
  return {
    sin: Math.sin,
    cos: Math.cos,
    tan: Math.tan,
    atan2: Math.atan2,
    sqrt: Math.sqrt,
    exp: Math.exp,
    log: Math.log,
    pow: Math.pow,
    fabs: Math.abs,
    floor: Math.floor,
    ceil: Math.ceil,
    putchard: (code) => {
      write(String.fromCharCode(code));
      return 0;
    },
    printd: (value) => {
      write(`${value.toFixed(6)}\n`);
      return 0;
    },
  };
}
