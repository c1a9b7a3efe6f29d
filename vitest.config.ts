import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    name: 'unit',
    root: './src',
    include: ['**/*.test.ts'],
    environment: 'node',
    env: {
      LOG_LEVEL: 'silent',
    },
  },
})
