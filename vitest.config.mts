import { defineConfig } from 'vitest/config';
import os from 'os';

export default defineConfig({
  test: {
    environment: 'node',

    // Include patterns
    include: [
      'packages/**/__tests__/**/*.test.ts',
      'apps/**/__tests__/**/*.test.ts',
    ],

    // Exclude patterns
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
    ],

    // Threads pool; tests share no state across files
    pool: 'threads',
    poolOptions: {
      threads: {
        maxThreads: Math.max(1, os.cpus().length),
        minThreads: 1,
        isolate: true,
      },
    },

    testTimeout: 10000,
    hookTimeout: 10000,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      include: ['packages/*/src/**/*.ts', 'apps/*/src/**/*.ts'],
      exclude: ['**/__tests__/**', '**/index.ts'],
    },

    reporters: ['default'],
  },
});
