import { defineConfig } from 'vitest/config';

/**
 * Test Pyramid Strategy: Unit / Integration
 *
 * Quality Gates (ALL must pass):
 * - Unit test coverage ≥80%
 * - Literal placement scenarios: 100% pass rate
 * - Test isolation failures: 0
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
        branches: 80,
        statements: 80
      },
      exclude: [
        'tests/**',
        'dist/**',
        'demo-layout.ts',
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
