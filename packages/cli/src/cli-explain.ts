/**
 * CLI Error Explanation
 * Registry documentation for `calx --explain`
 */

import { CATEGORY_PREFIX, ERROR_REGISTRY } from '@calx/core';

const ERROR_ID = new RegExp(`^CALX-[${Object.values(CATEGORY_PREFIX).join('')}]\\d{3}$`);

function indent(text: string, depth: number): string {
  const pad = ' '.repeat(depth);
  return text
    .split('\n')
    .map((line) => pad + line)
    .join('\n');
}

/**
 * Documentation for one error id: the heading, then Cause, Resolution and
 * Examples where the registry has them, separated by blank lines.
 *
 * @returns null for a malformed or unregistered id
 */
export function explainError(errorId: string): string | null {
  const definition = ERROR_ID.test(errorId) ? ERROR_REGISTRY.get(errorId) : undefined;
  if (!definition) return null;

  const blocks = [`${definition.errorId}: ${definition.description}`];
  if (definition.cause) {
    blocks.push(`Cause:\n${indent(definition.cause, 2)}`);
  }
  if (definition.resolution) {
    blocks.push(`Resolution:\n${indent(definition.resolution, 2)}`);
  }
  const examples = definition.examples ?? [];
  if (examples.length > 0) {
    const entries = examples.map(
      (example) => `${indent(example.description, 2)}\n\n${indent(example.code, 4)}`
    );
    blocks.push(`Examples:\n${entries.join('\n\n')}`);
  }
  return blocks.join('\n\n');
}
