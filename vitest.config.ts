import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['test/**/*.test.ts'],
    // Use forks pool so child processes spawned by tests are isolated per file
    pool: 'forks',
    testTimeout: process.platform === 'win32' ? 30000 : 10000,
    hookTimeout: process.platform === 'win32' ? 30000 : 10000,
    isolate: true,
    exclude: ['node_modules/**', 'dist/**'],
  },
  resolve: {
    extensions: ['.js', '.ts', '.json'],
  },
});
