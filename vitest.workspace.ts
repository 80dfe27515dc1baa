/**
 * Vitest Workspace Configuration
 *
 * Workspace Projects:
 * - core: @lexloom/core package tests
 * - cli: @lexloom/cli package tests
 *
 * Shared Configuration:
 * - globals: true (enables global test functions)
 * - environment: 'node' (Node.js test environment)
 * - coverage: configured in vitest.config.ts (root-level option)
 *
 * Run specific projects:
 *   npx vitest --project=core
 *   npx vitest --project=cli
 */
import { fileURLToPath } from 'node:url';
import { defineWorkspace } from 'vitest/config';

// The package manifest maps runtime imports to dist/; tests run the sources.
const coreSource = fileURLToPath(
  new URL('./packages/core/src/index.ts', import.meta.url)
);

export default defineWorkspace([
  // Core package (@lexloom/core)
  {
    test: {
      name: 'core',
      globals: true,
      environment: 'node',
      include: ['packages/core/tests/**/*.test.ts'],
    },
  },
  // CLI package (@lexloom/cli)
  {
    resolve: {
      alias: { '@lexloom/core': coreSource },
    },
    test: {
      name: 'cli',
      globals: true,
      environment: 'node',
      include: ['packages/cli/tests/**/*.test.ts'],
    },
  },
]);
