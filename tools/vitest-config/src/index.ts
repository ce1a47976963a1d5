import type { UserConfig } from 'vitest/config';

/** Coverage floor applied to every package unless overridden */
const COVERAGE_THRESHOLD = 90;

/**
 * Shared Vitest configuration for workspace packages.
 *
 * Tests live next to their sources as `*.test.ts`. Mocks are reset between
 * tests so module-level `vi.mock` factories start clean in every case.
 */
export const defineConfig = (options: UserConfig = {}): UserConfig => {
  return {
    ...options,
    test: {
      environment: 'node',
      globals: true,
      mockReset: true,
      clearMocks: true,
      pool: 'threads',
      include: ['src/**/*.{test,spec}.ts'],
      coverage: {
        provider: 'v8',
        reporter: process.env.TEST_MODE === 'ci' ? ['json-summary'] : ['text'],
        reportsDirectory: './coverage',
        include: ['src/**/*.ts'],
        exclude: ['**/index.ts', '**/*.test.ts'],
        thresholds: {
          lines: COVERAGE_THRESHOLD,
          functions: COVERAGE_THRESHOLD,
          branches: COVERAGE_THRESHOLD,
          statements: COVERAGE_THRESHOLD,
        },
      },
      ...options.test,
    },
  };
};
