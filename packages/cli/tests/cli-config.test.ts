/**
 * CLI Configuration Tests
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError } from '@calx/core';
import {
  CONFIG_FILE_NAME,
  loadConfig,
  parseConfig,
  resolveOptions,
  validateConfig,
} from '../src/cli-config.js';

describe('cli-config', () => {
  describe('parseConfig', () => {
    it('parses every known key', () => {
      const config = parseConfig(
        [
          'precedence:',
          "  '/': 40",
          '  "%": 40',
          'printModule: true',
          'evaluate: false',
          'format: compact',
          'verbose: true',
        ].join('\n')
      );

      expect(config).toEqual({
        precedence: { '/': 40, '%': 40 },
        printModule: true,
        evaluate: false,
        format: 'compact',
        verbose: true,
      });
    });

    it('treats an empty document as an empty configuration', () => {
      expect(parseConfig('')).toEqual({});
    });

    it('reports YAML syntax errors as configuration errors', () => {
      expect(() => parseConfig('format: [human')).toThrow(ConfigError);
    });
  });

  describe('validateConfig', () => {
    it('requires a mapping', () => {
      expect(() => validateConfig(['human'])).toThrow(
        'invalid configuration: must be a mapping'
      );
    });

    it('rejects unknown keys', () => {
      expect(() => validateConfig({ colour: true })).toThrow(
        'invalid configuration: unknown key colour'
      );
    });

    it('rejects non-boolean switches', () => {
      expect(() => validateConfig({ verbose: 'yes' })).toThrow(
        'invalid configuration: verbose must be true or false'
      );
    });

    it('rejects unknown formats', () => {
      expect(() => validateConfig({ format: 'xml' })).toThrow(
        'invalid configuration: format must be one of human, json, compact'
      );
    });

    it('rejects multi-character operators', () => {
      expect(() => validateConfig({ precedence: { '**': 50 } })).toThrow(
        'invalid configuration: operator ** must be a single character'
      );
    });

    it('rejects non-positive or fractional precedences', () => {
      expect(() => validateConfig({ precedence: { '/': 0 } })).toThrow(
        'invalid configuration: precedence of / must be a positive integer'
      );
      expect(() => validateConfig({ precedence: { '/': 2.5 } })).toThrow(
        'invalid configuration: precedence of / must be a positive integer'
      );
    });

    it('uses error id CALX-C001', () => {
      try {
        validateConfig(42);
        expect.unreachable();
      } catch (error) {
        expect(error instanceof ConfigError && error.errorId).toBe('CALX-C001');
      }
    });
  });

  describe('loadConfig', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'calx-config-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('returns an empty configuration when no file exists', () => {
      expect(loadConfig(undefined, dir)).toEqual({});
    });

    it('reads calx.config.yaml from the directory', () => {
      writeFileSync(join(dir, CONFIG_FILE_NAME), 'printModule: true\n');
      expect(loadConfig(undefined, dir)).toEqual({ printModule: true });
    });

    it('reads an explicit path', () => {
      const path = join(dir, 'other.yaml');
      writeFileSync(path, 'evaluate: false\n');
      expect(loadConfig(path, '/')).toEqual({ evaluate: false });
    });

    it('rejects a missing explicit path', () => {
      const path = join(dir, 'missing.yaml');
      expect(() => loadConfig(path)).toThrow(
        `invalid configuration: file not found: ${path}`
      );
    });
  });

  describe('resolveOptions', () => {
    it('applies defaults', () => {
      expect(resolveOptions({}, {})).toEqual({
        precedence: {},
        printModule: false,
        evaluate: true,
        format: 'human',
        verbose: false,
      });
    });

    it('lets flags override the file', () => {
      const resolved = resolveOptions(
        { evaluate: true, format: 'json' },
        { evaluate: false, format: 'compact', verbose: true }
      );
      expect(resolved).toMatchObject({ evaluate: true, format: 'json', verbose: true });
    });
  });
});
