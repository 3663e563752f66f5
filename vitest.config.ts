import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/unit/**/*.spec.ts'],
    env: {
      DATABASE_PATH: ':memory:',
    },
    coverage: {
      reporter: ['text', 'lcov'],
    },
  },
});
