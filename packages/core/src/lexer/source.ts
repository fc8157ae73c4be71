/**
 * Character Sources
 * The scanner pulls one character at a time from a CharSource.
 */

export interface CharSource {
  /** Next character, or '' once the input is exhausted (repeatedly) */
  read(): string;
}

/** Character source over an in-memory string, one code point at a time */
export function stringSource(text: string): CharSource {
  const chars = text[Symbol.iterator]();
  let done = false;
  return {
    read(): string {
      if (done) return '';
      const next = chars.next();
      if (next.done === true) {
        done = true;
        return '';
      }
      return next.value;
    },
  };
}
