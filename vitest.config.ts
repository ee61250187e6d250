import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: false,
    environment: 'node',
    coverage: {
      provider: 'v8',
      reporter: ['json-summary', 'text', 'lcov'],
      include: ['src'],
      exclude: ['__tests__', '__mocks__', 'src/types'],
    },
    setupFiles: ['__tests__/_setup'],
    include: ['__tests__/**/*.test.ts'],
    forceRerunTriggers: ['**/vitest.config.*/**', '**/__mocks__/**/*', '__tests__/_setup.ts'],
    alias: {
      '@/tests/': fileURLToPath(new URL('./__tests__/', import.meta.url)),
      '@/mocks/': fileURLToPath(new URL('./__mocks__/', import.meta.url)),
      '@/': fileURLToPath(new URL('./src/', import.meta.url)),
    },
  },
});
