import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    // Enable global test APIs like describe, it, expect
    globals: true,
    include: ['**/*.spec.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      include: ['*.ts'],
      exclude: ['**/*.spec.ts', 'vitest.config.ts', 'index.ts'],
    },
    environment: 'node',
  },
})
