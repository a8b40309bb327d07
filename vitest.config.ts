import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

export default defineConfig({
  resolve: {
    alias: {
      '@vaultline/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
      '@vaultline/encrypt': fileURLToPath(new URL('./packages/encrypt/src/index.ts', import.meta.url))
    }
  },
  test: {
    environment: 'node',
    include: ['packages/*/test/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/*/src/**/index.ts']
    },
    testTimeout: 30000
  }
})
