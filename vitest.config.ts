import { defineConfig } from 'vitest/config';

export default defineConfig({
  esbuild: { jsx: 'automatic' },
  test: {
    include: ['packages/**/tests/**/*.test.ts'],
    environment: 'node',
  },
});
