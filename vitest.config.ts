import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['./tests/setup.ts'],
    include: ['tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    // better-sqlite3 原生模块在 forks 池中更稳定
    pool: 'forks',
    testTimeout: 30000,
    hookTimeout: 10000,
  },
});
