import { defineEventHandler } from 'h3'
import { backlogSnapshot } from '../../../src/utils/concurrency'
import { getModelName } from '../../../src/utils/model'

export default defineEventHandler(() => {
  const openaiConfigured = Boolean(process.env.OPENAI_API_KEY)
  return {
    status: openaiConfigured ? 'ok' : 'degraded',
    timestamp: new Date().toISOString(),
    uptimeSeconds: Math.round(process.uptime()),
    services: {
      openai: {
        configured: openaiConfigured,
        plannerModel: getModelName('planner'),
        readerModel: getModelName('reader')
      },
      search: { provider: 'bing' }
    },
    research: backlogSnapshot(),
    env: {
      nodeEnv: process.env.NODE_ENV ?? 'development'
    }
  }
})
