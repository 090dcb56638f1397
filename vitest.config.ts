import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,

    setupFiles: ['./tests/setup.ts'],

    include: [
      'tests/**/*.{test,spec}.ts',
      'src/**/*.{test,spec}.ts',
    ],

    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      reportsDirectory: './coverage',
      include: ['src/**/*.ts'],
      exclude: [
        'src/index.ts',
        'src/**/types/**',
        'src/**/*.d.ts',
      ],
    },

    testTimeout: 10_000,
    pool: 'threads',
  },
})
