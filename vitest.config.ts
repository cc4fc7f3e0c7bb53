import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'apps/*/lib/**/*.test.ts', 'apps/*/test/**/*.test.ts'],
    testTimeout: 30000,
  },
})
