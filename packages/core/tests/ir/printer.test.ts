/**
 * Calx IR Tests: Printer
 */

import { describe, expect, it } from 'vitest';

import { formatDouble, IRModule } from '../../src/index.js';

describe('Calx IR: Printer', () => {
  describe('formatDouble', () => {
    it('prints six mantissa digits and a two-digit exponent', () => {
      expect(formatDouble(2)).toBe('2.000000e+00');
      expect(formatDouble(0.5)).toBe('5.000000e-01');
      expect(formatDouble(1234.5)).toBe('1.234500e+03');
      expect(formatDouble(0)).toBe('0.000000e+00');
    });

    it('keeps three-digit exponents', () => {
      expect(formatDouble(1e100)).toBe('1.000000e+100');
    });

    it('keeps the sign of negative zero', () => {
      expect(formatDouble(-0)).toBe('-0.000000e+00');
      expect(formatDouble(-3)).toBe('-3.000000e+00');
    });

    it('prints non-finite values as raw bits', () => {
      expect(formatDouble(Number.NaN)).toBe('0x7FF8000000000000');
      expect(formatDouble(Number.POSITIVE_INFINITY)).toBe('0x7FF0000000000000');
    });
  });

  it('prints a module with declarations and definitions', () => {
    const module = new IRModule();
    const sin = module.declareFunction('sin', ['x']);
    const fn = module.declareFunction('f', ['a']);
    const builder = module.beginFunctionBody(fn);
    const call = builder.call(sin, [builder.param(0)]);
    builder.ret(builder.toNumber(builder.lessThan(call, builder.constant(0.5))));

    expect(module.print()).toBe(
      [
        "; ModuleID = 'calx'",
        '',
        'declare double @sin(double)',
        '',
        'define double @f(double %a) {',
        'entry:',
        '  %calltmp = call double @sin(double %a)',
        '  %cmptmp = fcmp ult double %calltmp, 5.000000e-01',
        '  %booltmp = uitofp i1 %cmptmp to double',
        '  ret double %booltmp',
        '}',
        '',
      ].join('\n')
    );
  });

  it('prints an empty module as its header', () => {
    expect(new IRModule('scratch').print()).toBe("; ModuleID = 'scratch'\n");
  });
});
