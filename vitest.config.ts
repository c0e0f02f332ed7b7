import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['packages/*/test/**/*.test.ts'],
    environment: 'node',
    // RSA key generation dominates the slower suites
    testTimeout: 30_000,
  },
})
