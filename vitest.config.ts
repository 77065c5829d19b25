import { coverageConfigDefaults, defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['./src/**/*.test.ts'],
    testTimeout: 15_000,
    coverage: {
      exclude: ['test/**', '**/*types.ts', '**/index.ts', ...coverageConfigDefaults.exclude],
    },
  },
});
