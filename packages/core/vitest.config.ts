import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    name: 'core',
    testTimeout: 1000,
    hookTimeout: 1000,
    teardownTimeout: 1000,
    include: ['src/**/*.test.ts'],
  },
})
