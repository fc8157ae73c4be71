/**
 * Binary Operator Precedence Table
 * Maps operator characters to binding strength (higher binds tighter)
 */

import { ConfigError } from '../types.js';

/** Operators registered by the driver before parsing */
export const DEFAULT_PRECEDENCE: Readonly<Record<string, number>> = {
  '<': 10,
  '+': 20,
  '-': 20,
  '*': 40,
};

/** Precedence of anything that is not a binary operator */
export const NOT_AN_OPERATOR = -1;

export class PrecedenceTable {
  private readonly table = new Map<string, number>();

  constructor(entries: Readonly<Record<string, number>> = {}) {
    for (const [operator, precedence] of Object.entries(entries)) {
      this.set(operator, precedence);
    }
  }

  /** Table holding DEFAULT_PRECEDENCE, then `overrides` */
  static withDefaults(
    overrides: Readonly<Record<string, number>> = {}
  ): PrecedenceTable {
    return new PrecedenceTable({ ...DEFAULT_PRECEDENCE, ...overrides });
  }

  /**
   * Register an operator. A non-positive precedence is accepted and
   * makes the character a non-operator.
   *
   * @throws ConfigError (CALX-C002) for multi-character operators or
   * non-integer precedences
   */
  set(operator: string, precedence: number): this {
    if (operator.length !== 1 || !Number.isInteger(precedence)) {
      throw new ConfigError('CALX-C002', { operator, value: precedence });
    }
    this.table.set(operator, precedence);
    return this;
  }

  /** Registered precedence, or NOT_AN_OPERATOR */
  precedenceOf(operator: string): number {
    const precedence = this.table.get(operator);
    if (precedence === undefined || precedence <= 0) {
      return NOT_AN_OPERATOR;
    }
    return precedence;
  }

  isOperator(operator: string): boolean {
    return this.precedenceOf(operator) !== NOT_AN_OPERATOR;
  }

  entries(): [string, number][] {
    return [...this.table.entries()];
  }

  clone(): PrecedenceTable {
    return new PrecedenceTable(Object.fromEntries(this.table));
  }
}
