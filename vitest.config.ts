import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/tests/**/*.spec.ts'],
    coverage: {
      exclude: [
        'dist/**',
        'output/**',
        'src/cli/**',
        '**/*.d.ts'
      ]
    }
  }
});
