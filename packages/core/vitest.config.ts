import { defineConfig } from 'vitest/config';
import tsconfigPaths from 'vite-tsconfig-paths';

export default defineConfig({
  plugins: [tsconfigPaths({ root: '../..' })],
  test: {
    name: 'core',
    environment: 'node',
    include: ['src/**/*.test.ts', 'src/**/__tests__/**/*.test.ts'],
    env: {
      // fast-check defaults; override from the shell for longer runs
      FC_NUM_RUNS: process.env.FC_NUM_RUNS ?? '100',
      TEST_SEED: process.env.TEST_SEED ?? '424242',
    },
    setupFiles: ['./src/test-utils/setup.ts'],
    testTimeout: 10000,
    retry: 0,
  },
});
