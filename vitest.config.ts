import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['packages/*/test/**/*.test.ts'],
    environment: 'node',
    // bin tests spawn a tsx child process
    testTimeout: 20000,
  },
})
