import { coverageConfigDefaults, defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['./src/**/*.test.ts'],
    coverage: {
      exclude: ['**/types.ts', 'src/cli/bin.ts', ...coverageConfigDefaults.exclude],
    },
  },
});
