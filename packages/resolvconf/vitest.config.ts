import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'resolvconf',
    environment: 'node',
    include: ['src/**/*.{test,spec}.ts'],
  },
});
