import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'integration',
    globals: true,
    environment: 'node',
    include: ['test/**/*.integration.spec.ts'],
    testTimeout: 10000,
  },
});
