import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    name: 'dom',
    testTimeout: 1000,
    hookTimeout: 1000,
    teardownTimeout: 1000,
    environment: 'jsdom',
    include: ['src/**/*.test.ts'],
  },
})
