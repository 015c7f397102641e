import { defineConfig, coverageConfigDefaults } from 'vitest/config'
import { resolve, dirname } from 'path'
import { fileURLToPath } from 'url'

const __dirname = dirname(fileURLToPath(import.meta.url))
const isCI = process.env.CI === 'true'

export default defineConfig({
  resolve: {
    alias: {
      '@paperday/core': resolve(__dirname, 'packages/core/src/index.ts'),
      '@paperday/schedule': resolve(__dirname, 'packages/schedule/src/index.ts'),
      '@paperday/rendering': resolve(__dirname, 'packages/rendering/src/index.ts'),
      '@paperday/daemon': resolve(__dirname, 'packages/daemon/src/index.ts'),
      '@paperday/upload-server': resolve(__dirname, 'packages/upload-server/src/index.ts'),
    },
  },
  test: {
    include: [
      'packages/*/src/**/*.test.ts',
    ],
    exclude: [
      'node_modules/**',
      'dist/**',
    ],

    coverage: {
      provider: 'v8',
      reporter: isCI ? ['text', 'json', 'lcov'] : ['text', 'html'],
      reportsDirectory: './coverage',

      include: [
        'packages/*/src/**/*.ts',
      ],

      exclude: [
        ...coverageConfigDefaults.exclude,
        '**/*.test.ts',
        '**/__tests__/**',
        '**/*.d.ts',
        '**/index.ts',
        '**/cli.ts',
        '**/server.ts',
      ],

      thresholds: {
        lines: 60,
        branches: 50,
        functions: 60,
        statements: 60,
      },
    },
  },
})
