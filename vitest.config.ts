import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    setupFiles: ['test/setup.ts'],
    include: ['test/**/*.test.ts'],
    pool: 'threads',
    isolate: true,
    reporters: ['default'],
    testTimeout: 20_000,
    hookTimeout: 20_000
  }
})
