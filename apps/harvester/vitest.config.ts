import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

export default defineConfig({
  resolve: {
    alias: {
      // Workspace packages are tested from source, not their build output
      '@unitcost/logger': fileURLToPath(new URL('../../packages/logger/src/index.ts', import.meta.url)),
    },
  },
  test: {
    name: 'harvester',
    environment: 'node',
    include: ['src/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    setupFiles: ['./src/test-setup.ts'],
  },
})
