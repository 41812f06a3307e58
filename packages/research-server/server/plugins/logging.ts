import { defineNitroPlugin } from 'nitropack/runtime'
import { getLogger } from '../../src/services/logger'
import { clientAddress, resolveCorrelationId } from '../../src/utils/correlation'

// Research runs are long; anything slower than this outside them is worth a warning.
const SLOW_REQUEST_MS = Number(process.env.SLOW_REQUEST_MS || 5000)
const QUIET_PATHS = ['/api/v1/health']

export default defineNitroPlugin((nitro) => {
  const log = getLogger()

  nitro.hooks.hook('request', (event) => {
    const cid = resolveCorrelationId(event)
    const method = event.method
    const path = event.path
    const quiet = QUIET_PATHS.some((prefix) => path.startsWith(prefix))
    const isResearchRun = path.startsWith('/api/v1/research/')
    const started = Date.now()

    log.log(quiet ? 'debug' : 'info', 'request_received', { cid, method, path, ip: clientAddress(event) })

    event.node.res.once('finish', () => {
      const durationMs = Date.now() - started
      const statusCode = event.node.res.statusCode
      const slow = !isResearchRun && durationMs > SLOW_REQUEST_MS
      const level = statusCode >= 500 || slow ? 'warn' : quiet ? 'debug' : 'info'
      log.log(level, 'request_completed', { cid, method, path, statusCode, durationMs })
    })
  })
})
