/**
 * Vitest Configuration
 *
 * Shared Configuration:
 * - globals: true (enables global test functions)
 * - environment: 'node' (Node.js test environment)
 * - coverage: v8 provider with text, html, lcov reporters
 */
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['src/index.ts', 'src/cli-tokens.ts'],
    },
  },
});
