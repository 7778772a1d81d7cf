import type { UserConfig } from 'vitest/config';

/**
 * Shared Vitest configuration for every workspace
 *
 * `include` and coverage globs are relative to the directory holding the
 * calling vitest.config.ts.
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
      },
      ...options.test,
    },
  };
};
