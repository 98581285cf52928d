import { defineConfig } from 'vitest/config';

/**
 * Vitest Configuration for problemset-audit
 *
 * Tests are plain unit tests: pure functions over in-memory trees plus
 * filesystem fixtures written into per-test temp directories.
 * Override the worker count with PROBLEMSET_AUDIT_TEST_WORKERS.
 */
export default defineConfig(() => {
  let maxWorkers = 2;
  const envWorkers = parseInt(process.env.PROBLEMSET_AUDIT_TEST_WORKERS ?? '', 10);
  if (!isNaN(envWorkers) && envWorkers > 0) {
    maxWorkers = envWorkers;
  }

  return {
    test: {
      globals: true,
      environment: 'node',
      include: ['src/**/*.test.ts'],
      setupFiles: ['./vitest.setup.ts'],
      testTimeout: 30000,
      hookTimeout: 10000,
      pool: 'forks',
      poolOptions: {
        forks: {
          maxForks: maxWorkers,
          minForks: 1,
          isolate: true,
        },
      },
      coverage: {
        provider: 'v8',
        reporter: ['text', 'json', 'html'],
        exclude: [
          'node_modules/',
          'dist/',
          '**/*.test.ts',
          'vitest.config.ts',
          'vitest.setup.ts',
        ],
      },
    },
  };
});
