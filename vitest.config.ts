import { coverageConfigDefaults, defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    include: ['./src/**/*.test.ts'],
    coverage: {
      exclude: ['**/__fixtures__/**', '**/types/**', '**/*types.ts', ...coverageConfigDefaults.exclude],
    },
  },
});
