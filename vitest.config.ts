import { defineConfig } from 'vitest/config';
import tsconfigPaths from 'vite-tsconfig-paths';

const isCI = process.env.CI === 'true';

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    // Each package carries its own vitest.config.ts
    projects: ['packages/*'],

    // No retries: a flaky property test should surface immediately
    retry: 0,
    testTimeout: isCI ? 30000 : 10000,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json-summary'],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.test.ts',
        'packages/*/src/**/__tests__/**',
        'packages/*/src/test-utils/**',
      ],
    },
  },
});
