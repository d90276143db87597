import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    testTimeout: 10_000,
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: [
        // Top-level re-exports
        'src/index.ts',
        // Type-only files (interfaces, no executable code)
        'src/types/**',
        // CLI command handlers (require a TTY for E2E testing)
        'src/cli/commands/**',
        'src/cli/index.ts',
      ],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 75,
        statements: 80,
      },
    },
  },
  resolve: {
    conditions: ['node'],
  },
});
