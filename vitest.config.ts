import { defineConfig } from 'vitest/config';

/**
 * provcat test configuration
 *
 * - Deterministic ordering, no retries so flaky behaviour surfaces at once
 * - Extended timeouts for property-based suites (fast-check)
 * - Every workspace package is covered by a single run from the root
 */

// Unix-like systems use forks for isolation, Windows uses threads
const getPoolConfig = () => {
  const pool = process.platform === 'win32' ? 'threads' : 'forks';
  return { pool } as const;
};

const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    environment: 'node',
    ...getPoolConfig(),

    include: [
      'packages/*/src/**/*.{test,spec}.ts',
      'packages/*/test/**/*.{test,spec}.ts',
    ],
    exclude: ['**/node_modules/**', '**/dist/**', '**/coverage/**'],

    retry: 0,
    fileParallelism: !isCI,
    testTimeout: isCI ? 30000 : 10000,
    hookTimeout: 10000,

    reporters: ['default'],

    env: {
      NODE_ENV: 'test',
      FC_NUM_RUNS: isCI ? '500' : '100',
    },
  },
});
