import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    // One project per workspace package, plus the benchmark helpers
    projects: ['packages/@optcb/*/vitest.config.ts', 'benchmark/vitest.config.ts'],

    // Global test settings
    globals: true,
    environment: 'node',
    testTimeout: 30000,

    // Test file patterns
    include: ['**/*.{test,spec}.ts'],
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
      '**/.{idea,git,cache,output,temp}/**',
    ],

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      thresholds: {
        lines: 70,
        functions: 70,
        statements: 70,
        branches: 60,
      },
      exclude: [
        '**/node_modules/**',
        '**/dist/**',
        '**/*.config.ts',
        '**/*.d.ts',
        '**/__tests__/**',
        'benchmark/**',
        'examples/**',
      ],
    },

    // Setup files
    setupFiles: ['./vitest.setup.ts'],
  },
})
