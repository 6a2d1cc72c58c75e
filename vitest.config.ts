import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],

    // Mock cleanup settings
    mockReset: true,
    clearMocks: true,
    restoreMocks: true,

    env: {
      LOG_LEVEL: 'silent',
    },
  },
})
