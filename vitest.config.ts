import { defineConfig } from 'vitest/config';

/**
 * ObjectForge - Vitest Configuration
 *
 * - One run over every workspace package (co-located *.test.ts and test/ specs)
 * - No retries, so nondeterminism surfaces immediately
 * - fast-check defaults seeded from test/setup.ts
 */

const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    environment: 'node',
    pool: 'forks',
    setupFiles: ['./test/setup.ts'],

    include: ['packages/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/coverage/**'],

    retry: 0,
    testTimeout: isCI ? 30000 : 10000,
    hookTimeout: 10000,

    reporters: ['default'],
    watch: false,

    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      reporter: ['text', 'lcov', 'json-summary'],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.d.ts',
        'packages/*/src/**/__tests__/**',
        'packages/*/src/**/index.ts',
      ],
    },

    env: {
      NODE_ENV: 'test',
      TEST_SEED: '424242',
    },
  },
});
