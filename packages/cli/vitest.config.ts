import { defineConfig } from 'vitest/config';
import tsconfigPaths from 'vite-tsconfig-paths';

export default defineConfig({
  plugins: [tsconfigPaths({ root: '../..' })],
  test: {
    name: 'cli',
    environment: 'node',
    include: ['src/**/*.{test,spec}.ts'],
    env: {
      NO_COLOR: '1',
    },
  },
});
