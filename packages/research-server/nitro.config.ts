import { defineNitroConfig } from 'nitropack/config'
import { config as loadEnv } from 'dotenv'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'

const currentDir = dirname(fileURLToPath(import.meta.url))
const repoRoot = resolve(currentDir, '..', '..')

for (const dir of [repoRoot, currentDir]) {
  loadEnv({ path: resolve(dir, '.env'), override: false })
  loadEnv({ path: resolve(dir, '.env.local'), override: true })
}

export default defineNitroConfig({
  compatibilityDate: '2025-09-02',
  srcDir: '.',
  plugins: ['./server/plugins/logging.ts', './server/plugins/require-env.ts'],
  runtimeConfig: {
    OPENAI_API_KEY: process.env.OPENAI_API_KEY,
    OPENAI_BASE_URL: process.env.OPENAI_BASE_URL
  }
})
