import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['smart_contracts/**/*.spec.ts'],
    testTimeout: 10_000,
  },
})
