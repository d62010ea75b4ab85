import { defineConfig } from 'vitest/config';

/**
 * Unit tests cover each module in isolation (in-memory stores, temp dirs);
 * integration tests drive the full validate → feedback → improve → optimize loop.
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'tests/**',
        'scripts/**',
        'dist/**',
        '**/*.config.ts',
        '**/*.d.ts'
      ]
    },
    testTimeout: 10000,
    hookTimeout: 10000,
    setupFiles: ['./tests/setup.ts'],
    include: [
      'tests/unit/**/*.test.ts',
      'tests/integration/**/*.test.ts'
    ]
  }
});
