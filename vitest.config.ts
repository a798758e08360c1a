import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    // Enable global test APIs like describe, it, expect
    globals: true,
    include: ['**/*.spec.ts'],
    exclude: ['node_modules/**', 'dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['*.ts'],
      exclude: ['*.spec.ts', 'vitest.config.ts'],
    },
    environment: 'node',
  },
})
