import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['apps/*/src/**/*.test.ts', 'packages/*/src/**/*.test.ts'],
    environment: 'node',
    setupFiles: ['apps/harvester/src/test/no-network.setup.ts'],
    env: {
      LOG_LEVEL: 'fatal',
    },
  },
})
