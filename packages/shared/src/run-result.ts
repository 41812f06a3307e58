import type {
  FinalAnswer,
  ReaderReport,
  ResearchResultKind,
  ResearchRunConfig,
  RunUsageSummary,
  SynthesisFailure,
  TerminationReason
} from './research.js'
import type { TraceEvent } from './trace.js'

export type ResearchRunResult = {
  runId: string
  question: string
  config: ResearchRunConfig
  kind: ResearchResultKind
  terminationReason: TerminationReason
  /** Absent only when synthesis failed */
  answer?: FinalAnswer
  failure?: SynthesisFailure
  ledger: ReaderReport[]
  /** Rounds that issued a search */
  rounds: number
  usage: RunUsageSummary
  trace: TraceEvent[]
  startedAt: string
  finishedAt: string
  durationMs: number
}
