import { getHeader, setHeader, type H3Event } from 'h3'
import { genCorrelationId } from '../services/logger'

/**
 * Correlation id for a request: the one already attached to the event, else an
 * incoming `x-correlation-id` / `x-request-id`, else a fresh one. Echoed back
 * as a response header.
 */
export function resolveCorrelationId(event: H3Event): string {
  const attached: unknown = event.context.correlationId
  const cid =
    (typeof attached === 'string' && attached) ||
    getHeader(event, 'x-correlation-id') ||
    getHeader(event, 'x-request-id') ||
    genCorrelationId()
  event.context.correlationId = cid
  setHeader(event, 'x-correlation-id', cid)
  return cid
}

export function clientAddress(event: H3Event): string | undefined {
  const forwarded = (getHeader(event, 'x-forwarded-for') || '').split(',')[0]?.trim()
  return forwarded || event.node.req.socket?.remoteAddress
}
