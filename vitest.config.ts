/**
 * Root Vitest configuration.
 * Projects are defined in vitest.workspace.ts; coverage is a root-level option.
 */
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      include: ['packages/core/src/**/*.ts', 'packages/cli/src/**/*.ts'],
      exclude: ['packages/core/src/index.ts'],
    },
  },
});
