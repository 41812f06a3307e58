import { defineNitroPlugin } from 'nitropack/runtime'
import { missingRequiredEnv } from '../../src/utils/env'

export default defineNitroPlugin(() => {
  // Research runs cannot reach a model without a key; refuse to boot in production.
  if (process.env.NODE_ENV !== 'production') return
  const missing = missingRequiredEnv()
  if (missing.length > 0) {
    throw new Error(`[research-server] Missing required environment variables in production: ${missing.join(', ')}`)
  }
})
