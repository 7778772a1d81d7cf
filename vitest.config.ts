import { defineConfig } from 'vitest/config';

import { defineConfig as defineBaseConfig } from './tools/vitest-config/src/index';

const baseConfig = defineBaseConfig();

export default defineConfig({
  ...baseConfig,
  test: {
    ...baseConfig.test,
    include: [
      'tools/*/src/**/*.{test,spec}.ts',
      'packages/*/src/**/*.{test,spec}.ts',
    ],
    coverage: {
      ...baseConfig.test?.coverage,
      provider: 'v8',
      include: ['tools/*/src/**/*.ts', 'packages/*/src/**/*.ts'],
      exclude: [
        '**/index.ts',
        '**/*.test.ts',
        'packages/model/src/**', // Type definitions only
      ],
    },
  },
});
