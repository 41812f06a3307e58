import { fileURLToPath } from 'node:url'
import { defineConfig, configDefaults } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/**/__tests__/**/*.spec.ts'],
    exclude: [...configDefaults.exclude, '**/.output/**', '**/.nitro/**'],
    root: fileURLToPath(new URL('./', import.meta.url)),
    restoreMocks: true,
    env: { LOG_SILENT: 'true' }
  }
})
