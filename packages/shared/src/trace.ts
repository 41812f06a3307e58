import type {
  ReaderReportStatus,
  ResearchResultKind,
  TerminationReason,
  TokenUsage
} from './research.js'

export type ResearchState =
  | 'init'
  | 'planning'
  | 'direct_answer'
  | 'searching'
  | 'selecting'
  | 'reading'
  | 'reflecting'
  | 'synthesizing'
  | 'done'

export type AgentRole = 'planner' | 'reader'

export type AgentStage = 'plan' | 'select' | 'reflect' | 'synthesize' | 'read'

export type BudgetKind = 'rounds' | 'deadline' | 'tokens'

export type TraceErrorKind = 'search' | 'fetch' | 'agent' | 'cancelled' | 'ledger'

type TraceEventBase = {
  seq: number
  at: string
  elapsedMs: number
  round: number
}

export type TransitionTraceEvent = TraceEventBase & {
  type: 'transition'
  from: ResearchState
  to: ResearchState
  reason?: string
}

export type AgentOutputTraceEvent = TraceEventBase & {
  type: 'agent_output'
  role: AgentRole
  stage: AgentStage
  attempt: number
  documentId?: string
  raw: string
  /** Validated message, present only when the output decoded cleanly */
  validated?: unknown
  usage?: TokenUsage
  durationMs: number
}

export type DecodeFailureTraceEvent = TraceEventBase & {
  type: 'decode_failure'
  role: AgentRole
  stage: AgentStage
  attempt: number
  documentId?: string
  reason: string
  detail: string
  /** True when another attempt (the repair) follows */
  willRepair: boolean
}

export type SearchTraceEvent = TraceEventBase & {
  type: 'search'
  query: string
  when: string
  resultCount: number
  durationMs: number
}

export type SelectionTraceEvent = TraceEventBase & {
  type: 'selection'
  candidateCount: number
  selectedIds: string[]
  rejectedIds: string[]
  truncated: number
  skipped: boolean
}

export type ReaderReportTraceEvent = TraceEventBase & {
  type: 'reader_report'
  entryId: string
  documentId: string
  url: string
  status: ReaderReportStatus
  relevanceScore: number
  ledgerIndex: number
}

export type ErrorTraceEvent = TraceEventBase & {
  type: 'error'
  kind: TraceErrorKind
  stage?: AgentStage | 'search' | 'fetch'
  documentId?: string
  reason: string
  message: string
}

export type BudgetExceededTraceEvent = TraceEventBase & {
  type: 'budget_exceeded'
  kind: BudgetKind
  limit: number
  observed: number
}

export type RoundTimingTraceEvent = TraceEventBase & {
  type: 'round_timing'
  durationMs: number
  reports: number
}

export type RunCompletedTraceEvent = TraceEventBase & {
  type: 'run_completed'
  kind: ResearchResultKind
  terminationReason: TerminationReason
  ledgerSize: number
}

export type TraceEvent =
  | TransitionTraceEvent
  | AgentOutputTraceEvent
  | DecodeFailureTraceEvent
  | SearchTraceEvent
  | SelectionTraceEvent
  | ReaderReportTraceEvent
  | ErrorTraceEvent
  | BudgetExceededTraceEvent
  | RoundTimingTraceEvent
  | RunCompletedTraceEvent

export type TraceEventType = TraceEvent['type']

// Distributive omit so each variant keeps its own fields.
export type TraceEventInput = TraceEvent extends infer E
  ? E extends TraceEvent
    ? Omit<E, 'seq' | 'at' | 'elapsedMs' | 'round'> & { round?: number }
    : never
  : never
