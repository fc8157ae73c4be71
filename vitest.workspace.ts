/**
 * Vitest Workspace Configuration
 *
 * Workspace Projects:
 * - core: @calx/core package tests
 * - cli: @calx/cli package tests
 *
 * Run specific projects:
 *   npx vitest --project=core
 *   npx vitest --project=cli
 */
import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  // Core package (@calx/core)
  {
    test: {
      name: 'core',
      globals: true,
      environment: 'node',
      include: ['packages/core/tests/**/*.test.ts'],
    },
  },
  // CLI package (@calx/cli)
  {
    test: {
      name: 'cli',
      globals: true,
      environment: 'node',
      include: ['packages/cli/tests/**/*.test.ts'],
    },
  },
]);
