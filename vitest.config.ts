import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    pool: 'forks',
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    coverage: {
      reporter: ['text', 'json', 'html'],
    },
  },
  resolve: {
    alias: {
      '@facegate/system': new URL('./packages/system/src/index.ts', import.meta.url).pathname,
      '@facegate/recognition': new URL('./packages/recognition/src/index.ts', import.meta.url).pathname,
      '@facegate/actuation': new URL('./packages/actuation/src/index.ts', import.meta.url).pathname,
    },
  },
})
