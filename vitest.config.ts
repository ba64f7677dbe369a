import { fileURLToPath } from 'node:url'

import { defineConfig } from 'vitest/config'

function fromRoot(relative: string): string {
  return fileURLToPath(new URL(relative, import.meta.url))
}

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    // Each test file in its own worker
    isolate: true,
    pool: 'threads',

    // Mocks are built per test; only their call history needs clearing
    clearMocks: true,

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/**',
        '**/*.test.ts',
        '**/*.config.ts',
        'coverage/**',
        'dist/**',
        'test/**',
        'src/boot/main.ts',
      ],
      thresholds: {
        branches: 85,
        functions: 90,
        lines: 90,
        statements: 90,
      },
    },

    include: ['src/**/*.test.ts'],
  },
  resolve: {
    // Keep in sync with compilerOptions.paths
    alias: [
      { find: /^\$types$/, replacement: fromRoot('./src/types/index.ts') },
      { find: /^\$types\//, replacement: fromRoot('./src/types/') },
      { find: /^\$test-utils\//, replacement: fromRoot('./test/') },
      { find: /^@validation$/, replacement: fromRoot('./src/validation/index.ts') },
      { find: /^@logging$/, replacement: fromRoot('./src/logging/index.ts') },
      { find: /^@logging\//, replacement: fromRoot('./src/logging/') },
      { find: /^@boot\//, replacement: fromRoot('./src/boot/') },
      { find: /^@core\//, replacement: fromRoot('./src/core/') },
      { find: /^@features\//, replacement: fromRoot('./src/features/') },
      { find: /^@hardware\//, replacement: fromRoot('./src/hardware/') },
      { find: /^@system\//, replacement: fromRoot('./src/system/') },
      { find: /^@utils\//, replacement: fromRoot('./src/utils/') },
    ],
  },
})
