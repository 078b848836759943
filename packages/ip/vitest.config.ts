import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'ip',
    environment: 'node',
    include: ['src/**/*.{test,spec}.ts'],
  },
});
