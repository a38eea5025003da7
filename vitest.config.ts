import { defineConfig } from 'vitest/config';
export default defineConfig({
  test: {
    globals: true,
    include: ['packages/*/__tests__/**/*.spec.ts'],
    coverage: { include: ['packages/*/src/**/*.ts'], thresholds: { lines: 90 } },
    environment: 'node'
  }
});
