import { defineConfig } from 'vitest/config';

/**
 * Unit tests run against fakes only; integration tests bind in-process
 * servers to ephemeral ports and run elkjs in process.
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 75,
        statements: 80
      },
      exclude: [
        'tests/**',
        'dist/**',
        'examples/**',
        'src/engine/cli.ts',
        '**/*.config.ts',
        '**/*.d.ts'
      ]
    },
    testTimeout: 10000,
    hookTimeout: 10000,
    setupFiles: ['./tests/setup.ts'],
    include: [
      'tests/unit/**/*.test.ts',
      'tests/integration/**/*.test.ts'
    ]
  }
});
