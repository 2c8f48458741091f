import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.int.test.ts'],
    testTimeout: 10000,
    hookTimeout: 10000,
    fileParallelism: false,
  },
})
