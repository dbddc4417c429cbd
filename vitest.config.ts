import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['test/**/*.test.ts'],
    coverage: {
      reporter: ['text', 'text-summary', 'html', 'lcov', 'json-summary'],
      reportsDirectory: 'coverage',
      exclude: ['dist/**', '**/*.d.ts', 'src/cli/types/**', 'src/cli/index.ts', 'vitest.config.ts'],
    },
  },
});
