/**
 * Calx Error Taxonomy Tests
 * Registry, template rendering, error classes and results
 */

import { describe, expect, it } from 'vitest';

import {
  andThen,
  CalxError,
  ConfigError,
  createError,
  err,
  ERROR_REGISTRY,
  ExecutionError,
  isErr,
  isOk,
  LoweringError,
  map,
  ok,
  ParseError,
  renderMessage,
  unwrap,
  type Result,
} from '../../src/index.js';

describe('Calx Errors', () => {
  describe('Registry', () => {
    it('looks up definitions by id', () => {
      const definition = ERROR_REGISTRY.get('CALX-G003');
      expect(definition?.category).toBe('lowering');
      expect(definition?.messageTemplate).toBe('unknown function referenced: {name}');
    });

    it('uses CALX-{prefix}{3 digits} ids matching their category', () => {
      const prefixes = { parse: 'P', lowering: 'G', module: 'M', runtime: 'R', config: 'C' };
      for (const [errorId, definition] of ERROR_REGISTRY.entries()) {
        expect(errorId).toMatch(/^CALX-[PGMRC]\d{3}$/);
        expect(errorId.charAt(5)).toBe(prefixes[definition.category]);
      }
    });

    it('returns undefined for unknown ids', () => {
      expect(ERROR_REGISTRY.get('CALX-Z999')).toBeUndefined();
      expect(ERROR_REGISTRY.has('')).toBe(false);
    });

    it('keeps descriptions short', () => {
      for (const [, definition] of ERROR_REGISTRY.entries()) {
        expect(definition.description.length).toBeLessThanOrEqual(50);
      }
    });
  });

  describe('renderMessage', () => {
    it('substitutes placeholders', () => {
      expect(renderMessage('{name} expects {expected}', { name: 'f', expected: 2 })).toBe(
        'f expects 2'
      );
    });

    it('renders missing values as empty strings', () => {
      expect(renderMessage('Hello {name}!', {})).toBe('Hello !');
    });

    it('joins arrays with commas', () => {
      expect(renderMessage('{problems}', { problems: ['a', 'b'] })).toBe('a, b');
    });

    it('returns a template with an unclosed brace unchanged', () => {
      expect(renderMessage('Error: {unclosed', { unclosed: 'x' })).toBe('Error: {unclosed');
    });
  });

  describe('Error classes', () => {
    it('appends the location to the message', () => {
      const error = createError('CALX-G001', { name: 'y' }, { line: 1, column: 10, offset: 9 });

      expect(error).toBeInstanceOf(CalxError);
      expect(error.message).toBe('unknown variable name: y at 1:10');
      expect(error.category).toBe('lowering');
    });

    it('strips the location from structured data', () => {
      const error = new ParseError('CALX-P002', { found: 'end of input' }, {
        line: 3,
        column: 4,
        offset: 20,
      });

      expect(error.toData()).toEqual({
        errorId: 'CALX-P002',
        message: "expected ')' but found end of input",
        location: { line: 3, column: 4, offset: 20 },
        context: { found: 'end of input' },
      });
    });

    it('omits the location suffix for unlocated errors', () => {
      expect(new ExecutionError('CALX-R003', { limit: 5 }).message).toBe(
        'call depth exceeded 5'
      );
    });

    it('locates lowering errors at the node start', () => {
      const node = {
        span: {
          start: { line: 2, column: 3, offset: 7 },
          end: { line: 2, column: 4, offset: 8 },
        },
      };
      const error = LoweringError.fromNode('CALX-G003', node, { name: 'g' });
      expect(error.location).toEqual({ line: 2, column: 3, offset: 7 });
      expect(error.name).toBe('LoweringError');
    });

    it('rejects ids of another category', () => {
      expect(() => new ConfigError('CALX-P001', {})).toThrow(
        'Expected config error ID, got: CALX-P001'
      );
    });

    it('rejects unknown ids', () => {
      expect(() => createError('CALX-Z999', {})).toThrow('Unknown error ID: CALX-Z999');
    });
  });

  describe('Result', () => {
    const half = (n: number): Result<number, string> =>
      n % 2 === 0 ? ok(n / 2) : err(`${n} is odd`);

    it('chains successes', () => {
      const result = andThen(half(8), half);
      expect(isOk(result) && result.value).toBe(2);
      expect(unwrap(map(result, (n) => n + 1))).toBe(3);
    });

    it('short-circuits failures', () => {
      const result = andThen(half(6), half);
      expect(isErr(result) && result.error).toBe('3 is odd');
      expect(map(result, (n) => n + 1)).toBe(result);
    });

    it('throws the error when unwrapping a failure', () => {
      expect(() => unwrap(err(new Error('boom')))).toThrow('boom');
    });
  });
});
