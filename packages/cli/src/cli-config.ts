/**
 * Configuration Loader
 * Loads and validates calx.config.yaml files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml, YAMLParseError } from 'yaml';
import { ConfigError } from '@calx/core';
import type { CliFlags } from './cli-args.js';
import { isOutputFormat, type OutputFormat } from './cli-error-formatter.js';

// ============================================================
// CONSTANTS
// ============================================================

export const CONFIG_FILE_NAME = 'calx.config.yaml';

const KNOWN_KEYS = new Set(['precedence', 'printModule', 'evaluate', 'format', 'verbose']);

// ============================================================
// TYPES
// ============================================================

export interface CalxConfig {
  /** Operator character to precedence, merged over the defaults */
  precedence?: Record<string, number> | undefined;
  printModule?: boolean | undefined;
  evaluate?: boolean | undefined;
  format?: OutputFormat | undefined;
  verbose?: boolean | undefined;
}

/** Settings after flags are applied over the config file */
export interface ResolvedOptions {
  precedence: Record<string, number>;
  printModule: boolean;
  evaluate: boolean;
  format: OutputFormat;
  verbose: boolean;
}

// ============================================================
// VALIDATION
// ============================================================

function invalid(reason: string): ConfigError {
  return new ConfigError('CALX-C001', { reason });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPrecedence(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function optionalBoolean(config: Record<string, unknown>, key: string): boolean | undefined {
  const value = config[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') {
    throw invalid(`${key} must be true or false`);
  }
  return value;
}

/**
 * Validate parsed configuration data.
 * An empty document is an empty configuration.
 *
 * @throws ConfigError (CALX-C001) describing the first invalid entry
 */
export function validateConfig(data: unknown): CalxConfig {
  if (data === null || data === undefined) {
    return {};
  }
  if (!isRecord(data)) {
    throw invalid('must be a mapping');
  }

  for (const key of Object.keys(data)) {
    if (!KNOWN_KEYS.has(key)) {
      throw invalid(`unknown key ${key}`);
    }
  }

  const config: CalxConfig = {
    printModule: optionalBoolean(data, 'printModule'),
    evaluate: optionalBoolean(data, 'evaluate'),
    verbose: optionalBoolean(data, 'verbose'),
  };

  const format = data['format'];
  if (format !== undefined) {
    if (!isOutputFormat(format)) {
      throw invalid('format must be one of human, json, compact');
    }
    config.format = format;
  }

  const precedence = data['precedence'];
  if (precedence !== undefined) {
    if (!isRecord(precedence)) {
      throw invalid('precedence must map operators to integers');
    }
    const table: Record<string, number> = {};
    for (const [operator, value] of Object.entries(precedence)) {
      if (operator.length !== 1) {
        throw invalid(`operator ${operator} must be a single character`);
      }
      if (!isPrecedence(value)) {
        throw invalid(`precedence of ${operator} must be a positive integer`);
      }
      table[operator] = value;
    }
    config.precedence = table;
  }

  return config;
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/** Parse YAML text into a validated configuration */
export function parseConfig(text: string): CalxConfig {
  let data: unknown;
  try {
    data = parseYaml(text);
  } catch (error) {
    if (error instanceof YAMLParseError) {
      throw invalid(error.message);
    }
    throw error;
  }
  return validateConfig(data);
}

/**
 * Load configuration from `configPath`, or from calx.config.yaml in `cwd`
 * when it exists.
 *
 * @throws ConfigError (CALX-C001) when an explicit path does not exist or
 * the file is invalid
 */
export function loadConfig(configPath?: string, cwd: string = process.cwd()): CalxConfig {
  if (configPath !== undefined) {
    if (!existsSync(configPath)) {
      throw invalid(`file not found: ${configPath}`);
    }
    return parseConfig(readFileSync(configPath, 'utf-8'));
  }

  const defaultPath = join(cwd, CONFIG_FILE_NAME);
  if (!existsSync(defaultPath)) {
    return {};
  }
  return parseConfig(readFileSync(defaultPath, 'utf-8'));
}

/** Apply command-line flags over file configuration and defaults */
export function resolveOptions(flags: CliFlags, config: CalxConfig): ResolvedOptions {
  return {
    precedence: config.precedence ?? {},
    printModule: flags.printModule ?? config.printModule ?? false,
    evaluate: flags.evaluate ?? config.evaluate ?? true,
    format: flags.format ?? config.format ?? 'human',
    verbose: flags.verbose ?? config.verbose ?? false,
  };
}
