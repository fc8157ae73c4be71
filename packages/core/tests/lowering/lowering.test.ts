/**
 * Calx Lowering Tests
 * AST to IR module translation
 */

import { describe, expect, it } from 'vitest';

import {
  createParser,
  Interpreter,
  Lowering,
  PrecedenceTable,
  type BlockContext,
  type IRFunction,
  type LowerResult,
  type TargetModule,
} from '../../src/index.js';
import { createLowerer } from '../helpers/lower.js';

function lowered(result: LowerResult<IRFunction>): IRFunction {
  if (!result.ok) throw result.error;
  return result.value;
}

function failure(result: LowerResult<IRFunction>): string {
  if (result.ok) throw new Error(`expected failure lowering ${result.value.name}`);
  return result.error.message;
}

describe('Calx Lowering', () => {
  describe('Definitions', () => {
    it('lowers a two-parameter function', () => {
      const { module, lower } = createLowerer();
      const fn = lowered(lower('def add(a b) a+b'));

      expect(module.printFunction(fn)).toBe(
        [
          'define double @add(double %a, double %b) {',
          'entry:',
          '  %addtmp = fadd double %a, %b',
          '  ret double %addtmp',
          '}',
        ].join('\n')
      );
      expect(module.verifyFunction(fn)).toEqual([]);
    });

    it('widens comparisons to a number', () => {
      const { module, lower } = createLowerer();
      const fn = lowered(lower('def lt(a b) a<b'));

      expect(module.printFunction(fn)).toBe(
        [
          'define double @lt(double %a, double %b) {',
          'entry:',
          '  %cmptmp = fcmp ult double %a, %b',
          '  %booltmp = uitofp i1 %cmptmp to double',
          '  ret double %booltmp',
          '}',
        ].join('\n')
      );
    });

    it('does not fold constants', () => {
      const { module, lower } = createLowerer();
      const fn = lowered(lower('1+2'));

      expect(module.printFunction(fn)).toBe(
        [
          'define double @__anon_expr() {',
          'entry:',
          '  %addtmp = fadd double 1.000000e+00, 2.000000e+00',
          '  ret double %addtmp',
          '}',
        ].join('\n')
      );
    });

    it('uniques repeated result names', () => {
      const { module, lower } = createLowerer();
      const fn = lowered(lower('def t(a) a+a+a'));

      expect(module.printFunction(fn)).toContain(
        '  %addtmp1 = fadd double %addtmp, %a'
      );
    });

    it('lowers calls to declared functions', () => {
      const { module, lower } = createLowerer();
      lowered(lower('extern sin(x)'));
      const fn = lowered(lower('def s(y) sin(y)+1'));

      expect(module.printFunction(fn)).toBe(
        [
          'define double @s(double %y) {',
          'entry:',
          '  %calltmp = call double @sin(double %y)',
          '  %addtmp = fadd double %calltmp, 1.000000e+00',
          '  ret double %addtmp',
          '}',
        ].join('\n')
      );
    });

    it('lets a body call its own function', () => {
      const { lower } = createLowerer();
      expect(lower('def r(x) r(x)').ok).toBe(true);
    });
  });

  describe('Declarations', () => {
    it('declares an extern without a body', () => {
      const { module, lower } = createLowerer();
      const fn = lowered(lower('extern atan2(y x)'));

      expect(fn.isDeclaration).toBe(true);
      expect(module.printFunction(fn)).toBe('declare double @atan2(double, double)');
    });

    it('reuses an extern declaration for a later definition', () => {
      const { module, lower } = createLowerer();
      const declared = lowered(lower('extern foo(a b)'));
      const defined = lowered(lower('def foo(a b) a+b'));

      expect(defined).toBe(declared);
      expect(module.size).toBe(1);
      expect(defined.isDeclaration).toBe(false);
    });

    it('binds the body to the declared parameter names', () => {
      const { module, lower } = createLowerer();
      lowered(lower('extern g(p q)'));
      const fn = lowered(lower('def g(a b) p-q'));

      expect(module.printFunction(fn)).toBe(
        [
          'define double @g(double %p, double %q) {',
          'entry:',
          '  %subtmp = fsub double %p, %q',
          '  ret double %subtmp',
          '}',
        ].join('\n')
      );
    });

    it('does not bind the names of a later prototype', () => {
      const { module, lower } = createLowerer();
      lowered(lower('extern g(p q)'));

      const result = lower('def g(a b) a-b');
      expect(failure(result)).toBe('unknown variable name: a at 1:12');
      expect(!result.ok && result.error.context).toEqual({
        name: 'a',
        candidates: ['p', 'q'],
      });
      expect(module.lookupFunction('g')?.isDeclaration).toBe(true);
    });

    it('rejects a redeclaration with another parameter count', () => {
      const { module, lower } = createLowerer();
      lowered(lower('extern f(a)'));

      expect(failure(lower('def f(a b) a'))).toBe(
        'function redeclared with a different number of parameters: f has 1, got 2 at 1:5'
      );
      expect(module.lookupFunction('f')?.isDeclaration).toBe(true);
    });

    it('keeps the first body when a function is defined again', () => {
      const { module, lower } = createLowerer();
      lowered(lower('def f(x) x'));
      const fn = lowered(lower('def f(x) x*2'));

      expect(fn.blocks.map((block) => block.name)).toEqual(['entry', 'entry1']);
      expect(module.printFunction(fn)).toBe(
        [
          'define double @f(double %x) {',
          'entry:',
          '  ret double %x',
          '',
          'entry1:',
          '  %multmp = fmul double %x, 2.000000e+00',
          '  ret double %multmp',
          '}',
        ].join('\n')
      );
      expect(new Interpreter(module).run('f', [3])).toBe(3);
    });
  });

  describe('Errors', () => {
    it('rejects calls to unknown functions and discards the expression', () => {
      const { module, lower } = createLowerer();

      expect(failure(lower('bar(1, 2)'))).toBe('unknown function referenced: bar at 1:1');
      expect(module.size).toBe(0);
    });

    it('rejects calls with the wrong number of arguments', () => {
      const { lower } = createLowerer();
      lowered(lower('extern atan2(y x)'));

      const result = lower('atan2(1)');
      expect(failure(result)).toBe(
        'incorrect number of arguments: atan2 expects 2, got 1 at 1:1'
      );
      expect(!result.ok && result.error.context).toEqual({
        name: 'atan2',
        expected: 2,
        actual: 1,
      });
    });

    it("does not see another function's parameters", () => {
      const { module, lower } = createLowerer();
      lowered(lower('def f(x) x'));

      const result = lower('def g(y) x');
      expect(failure(result)).toBe('unknown variable name: x at 1:10');
      expect(!result.ok && result.error.context).toEqual({
        name: 'x',
        candidates: ['y'],
      });
      expect(module.list().map((fn) => fn.name)).toEqual(['f']);
    });

    it('has no variables in top-level expressions', () => {
      const { lower } = createLowerer();
      expect(failure(lower('x + 1'))).toBe('unknown variable name: x at 1:1');
    });

    it('rejects operators without a lowering rule', () => {
      const { module, lower } = createLowerer(PrecedenceTable.withDefaults({ '/': 40 }));

      expect(failure(lower('def h(a) a/2'))).toBe('invalid binary operator: / at 1:10');
      expect(module.lookupFunction('h')).toBeUndefined();
    });

    it('keeps a prior declaration when the body fails', () => {
      const { module, lower } = createLowerer();
      const declared = lowered(lower('extern foo(a)'));

      expect(failure(lower('def foo(a) b'))).toBe('unknown variable name: b at 1:12');
      expect(module.lookupFunction('foo')).toBe(declared);
      expect(module.printFunction(declared)).toBe('declare double @foo(double)');
    });

    it('drops only the new block when a redefinition fails', () => {
      const { module, lower } = createLowerer();
      const fn = lowered(lower('def f(x) x'));

      expect(failure(lower('def f(x) q'))).toBe('unknown variable name: q at 1:10');
      expect(fn.blocks.map((block) => block.name)).toEqual(['entry']);
      expect(module.verifyFunction(fn)).toEqual([]);
      expect(new Interpreter(module).run('f', [3])).toBe(3);
    });

    it('binds repeated parameter names to their uniqued forms', () => {
      const { module, lower } = createLowerer();
      const fn = lowered(lower('def f(x x) x1-x'));

      expect(module.printFunction(fn)).toBe(
        [
          'define double @f(double %x, double %x1) {',
          'entry:',
          '  %subtmp = fsub double %x1, %x',
          '  ret double %subtmp',
          '}',
        ].join('\n')
      );
    });

    it('reports the left operand failure first', () => {
      const { lower } = createLowerer();
      expect(failure(lower('def f(a) b + c'))).toBe('unknown variable name: b at 1:10');
    });
  });

  describe('Target modules', () => {
    interface TextFunction {
      name: string;
      params: readonly string[];
      body?: string;
    }

    /** Target that renders expressions as text */
    class TextModule implements TargetModule<TextFunction, string> {
      readonly functions = new Map<string, TextFunction>();

      declareFunction(name: string, params: readonly string[]): TextFunction {
        const fn: TextFunction = { name, params };
        this.functions.set(name, fn);
        return fn;
      }
      lookupFunction(name: string): TextFunction | undefined {
        return this.functions.get(name);
      }
      paramNames(fn: TextFunction): readonly string[] {
        return fn.params;
      }
      beginFunctionBody(fn: TextFunction): BlockContext<TextFunction, string> {
        return {
          constant: (value) => String(value),
          param: (index) => fn.params[index] ?? '?',
          add: (lhs, rhs) => `(${lhs} + ${rhs})`,
          sub: (lhs, rhs) => `(${lhs} - ${rhs})`,
          mul: (lhs, rhs) => `(${lhs} * ${rhs})`,
          lessThan: (lhs, rhs) => `(${lhs} < ${rhs})`,
          toNumber: (flag) => `num${flag}`,
          call: (callee, args) => `${callee.name}(${args.join(', ')})`,
          ret: (value) => {
            fn.body = value;
          },
        };
      }
      discardFunctionBody(fn: TextFunction): void {
        delete fn.body;
      }
      eraseFunction(fn: TextFunction): void {
        this.functions.delete(fn.name);
      }
      verifyFunction(): readonly string[] {
        return [];
      }
    }

    it('emits only through the target module interface', () => {
      const module = new TextModule();
      const lowering = new Lowering(module);
      const parser = createParser('extern sq(v) def f(a b) sq(a*b+1) < 2');

      const extern = parser.parseExtern();
      const definition = parser.parseDefinition();
      if (!extern.ok) throw extern.error;
      if (!definition.ok) throw definition.error;

      expect(lowering.lowerPrototype(extern.value).ok).toBe(true);
      const result = lowering.lowerFunction(definition.value);

      expect(result.ok && result.value.body).toBe('num(sq(((a * b) + 1)) < 2)');
    });

    it('erases a function whose verification fails', () => {
      class RejectingModule extends TextModule {
        override verifyFunction(): readonly string[] {
          return ['no good'];
        }
      }
      const module = new RejectingModule();
      const lowering = new Lowering(module);
      const definition = createParser('def f(a) a').parseDefinition();
      if (!definition.ok) throw definition.error;

      const result = lowering.lowerFunction(definition.value);
      expect(!result.ok && result.error.message).toBe(
        'function f failed verification: no good at 1:1'
      );
      expect(module.functions.size).toBe(0);
    });

    it('keeps an earlier declaration whose new body fails verification', () => {
      class RejectingModule extends TextModule {
        override verifyFunction(): readonly string[] {
          return ['no good'];
        }
      }
      const module = new RejectingModule();
      const declared = module.declareFunction('f', ['a']);
      const lowering = new Lowering(module);
      const definition = createParser('def f(a) a').parseDefinition();
      if (!definition.ok) throw definition.error;

      expect(lowering.lowerFunction(definition.value).ok).toBe(false);
      expect(module.functions.get('f')).toBe(declared);
      expect(declared.body).toBeUndefined();
    });
  });
});
