import { createError, defineEventHandler, readBody, setHeader } from 'h3'
import { ResearchRunRequestSchema } from '@deepseeker/shared'
import { backlogSnapshot, isBacklogFull, researchSemaphore, withResearchConcurrency } from '../../../../src/utils/concurrency'
import { buildRunConfig } from '../../../../src/utils/config'
import { getLogger } from '../../../../src/services/logger'
import { getResearchController } from '../../../../src/services/research-container'
import { resolveCorrelationId } from '../../../../src/utils/correlation'

export default defineEventHandler(async (event) => {
  if (isBacklogFull()) {
    const snap = backlogSnapshot()
    getLogger().warn('research_run_backlog_reject', snap)
    setHeader(event, 'Retry-After', 2)
    setHeader(event, 'Cache-Control', 'no-store')
    setHeader(event, 'X-Backlog-Pending', String(snap.pending))
    setHeader(event, 'X-Backlog-Limit', String(snap.limit))
    throw createError({ statusCode: 503, statusMessage: 'Server busy. Please retry.' })
  }

  const body: unknown = await readBody(event)
  const parsed = ResearchRunRequestSchema.safeParse(body)
  if (!parsed.success) {
    throw createError({
      statusCode: 400,
      statusMessage: 'Invalid research request',
      data: { issues: parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })) }
    })
  }

  const correlationId = resolveCorrelationId(event)

  const config = buildRunConfig(parsed.data.config ?? {})

  // Client gone before the response: stop researching, still produce a result for the logs.
  const controller = new AbortController()
  const res = event.node.res
  res.once('close', () => {
    if (!res.writableEnded) controller.abort()
  })

  if (researchSemaphore.pending > 0 || researchSemaphore.used > 0) {
    getLogger().info('research_run_queue', { ...backlogSnapshot(), correlationId })
  }

  return withResearchConcurrency(() =>
    getResearchController().run({
      question: parsed.data.question,
      config,
      correlationId,
      signal: controller.signal
    })
  )
})
