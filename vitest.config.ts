import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['index.test.ts', 'src/**/*.test.ts', 'test-config/**/*.test.ts'],
    exclude: ['dist/**', 'node_modules/**'],
    restoreMocks: true,
  },
});
