import type { TraceEvent, TraceEventInput } from '@deepseeker/shared'
import type winston from 'winston'
import { getRunLogger } from './logger'

export type RunTraceCounters = {
  agentCalls: number
  agentFailures: number
  decodeFailures: number
  repairs: number
  errors: number
}

type RunTraceOptions = {
  logger?: winston.Logger
  now?: () => number
}

const WARN_TYPES = new Set<TraceEvent['type']>(['error', 'decode_failure', 'budget_exceeded'])

function logMetadata(event: TraceEvent): Record<string, unknown> {
  if (event.type === 'agent_output') {
    const { raw, validated, ...rest } = event
    return { ...rest, rawLength: raw.length, decoded: validated !== undefined }
  }
  return { ...event }
}

/**
 * Ordered, append-only record of what a run did. Each event is also written to
 * the run's logger. Nothing reads the trace back to make decisions.
 */
export class RunTrace {
  private readonly events: TraceEvent[] = []
  private readonly logger: winston.Logger
  private readonly now: () => number
  private readonly startedAtMs: number
  private seq = 0
  private currentRound = 0
  private readonly tally: RunTraceCounters = {
    agentCalls: 0,
    agentFailures: 0,
    decodeFailures: 0,
    repairs: 0,
    errors: 0
  }

  constructor(
    readonly runId: string,
    readonly correlationId: string,
    options?: RunTraceOptions
  ) {
    this.logger = options?.logger ?? getRunLogger({ runId, correlationId })
    this.now = options?.now ?? Date.now
    this.startedAtMs = this.now()
  }

  setRound(round: number) {
    this.currentRound = round
  }

  record(input: TraceEventInput): TraceEvent {
    const at = this.now()
    this.seq += 1
    const event: TraceEvent = {
      ...input,
      seq: this.seq,
      at: new Date(at).toISOString(),
      elapsedMs: at - this.startedAtMs,
      round: input.round ?? this.currentRound
    }
    this.events.push(event)
    this.count(event)

    const level = WARN_TYPES.has(event.type) ? 'warn' : event.type === 'agent_output' ? 'debug' : 'info'
    this.logger.log(level, `research_${event.type}`, logMetadata(event))
    return event
  }

  list(): TraceEvent[] {
    return this.events.map((event) => Object.freeze({ ...event }))
  }

  get length() {
    return this.events.length
  }

  counters(): RunTraceCounters {
    return { ...this.tally }
  }

  private count(event: TraceEvent) {
    switch (event.type) {
      case 'agent_output':
        this.tally.agentCalls += 1
        break
      case 'decode_failure':
        this.tally.decodeFailures += 1
        if (event.willRepair) this.tally.repairs += 1
        break
      case 'error':
        this.tally.errors += 1
        if (event.kind === 'agent') this.tally.agentFailures += 1
        break
      default:
        break
    }
  }
}
