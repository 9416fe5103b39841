import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

/**
 * runstat test configuration
 * - Tests live beside their sources as *.test.ts
 * - Workspace packages resolve to their TypeScript sources, no build needed
 * - fast-check seed and run count come from the env block below
 */

const isCI = process.env.CI === 'true';

export default defineConfig({
  resolve: {
    conditions: ['source'],
    alias: {
      '@runstat/core': fileURLToPath(
        new URL('./packages/core/src/index.ts', import.meta.url)
      ),
    },
  },
  test: {
    environment: 'node',
    pool: process.platform === 'win32' ? 'threads' : 'forks',
    setupFiles: ['./test/setup.ts'],
    include: ['packages/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],

    // No retries - surface issues immediately
    retry: 0,
    testTimeout: isCI ? 30000 : 10000,
    reporters: ['default'],

    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/*/src/**/*.{test,spec}.ts'],
    },

    env: {
      NODE_ENV: 'test',
      TEST_SEED: '424242',
      FC_NUM_RUNS: isCI ? '1000' : '100',
    },
  },
});
