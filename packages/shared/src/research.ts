import { z } from 'zod'

export const RecencyEnum = z.enum(['day', 'week', 'month', 'any'])
export type Recency = z.infer<typeof RecencyEnum>

// Run-scoped limits. Every field has a default so a bare `{}` parses to a usable config.
export const ResearchRunConfigSchema = z.object({
  maxRounds: z.number().int().min(1).max(10).default(3),
  concurrency: z.number().int().min(1).max(16).default(5),
  perRoundResultCap: z.number().int().min(1).max(50).default(10),
  perRoundSelectionCap: z.number().int().min(1).max(20).default(5),
  runTimeoutMs: z.number().int().min(1000).default(300_000),
  maxTotalTokens: z.number().int().positive().optional(),
  // Reports scoring below this are not shown to the synthesizer; they stay in the ledger.
  minRelevanceForSynthesis: z.number().min(0).max(1).default(0),
  defaultRecency: RecencyEnum.default('any')
})
export type ResearchRunConfig = z.infer<typeof ResearchRunConfigSchema>
export type ResearchRunConfigInput = z.input<typeof ResearchRunConfigSchema>

export const ResearchRunRequestSchema = z.object({
  question: z.string().trim().min(1).max(4000),
  config: ResearchRunConfigSchema.partial().optional()
})
export type ResearchRunRequest = z.infer<typeof ResearchRunRequestSchema>

export const SearchQuerySchema = z.object({
  query: z.string().min(1),
  when: RecencyEnum,
  include: z.array(z.string()).default([]),
  exclude: z.array(z.string()).default([]),
  allowDomains: z.array(z.string()).default([]),
  denyDomains: z.array(z.string()).default([]),
  maxResults: z.number().int().positive()
})
export type SearchQuery = z.infer<typeof SearchQuerySchema>

export type CandidateSourceMetadata = {
  domain: string | null
  displayUrl: string | null
  attribution: string | null
  /** ISO timestamp guessed from the result's attribution line, when one was found */
  publishedHint: string | null
}

export type CandidateDocument = {
  /** Round-local identifier shown to the planner (`r1`, `r2`, ...) */
  id: string
  /** Document reference; unique within one round's candidate list */
  url: string
  title: string
  snippet: string
  source: CandidateSourceMetadata
}

export const ReaderReportStatusEnum = z.enum(['ok', 'fetch_failed', 'parse_failed', 'agent_malformed'])
export type ReaderReportStatus = z.infer<typeof ReaderReportStatusEnum>

export type ReaderReport = {
  /** `<round>:<documentId>`; unique across the run */
  entryId: string
  round: number
  documentId: string
  url: string
  title: string
  summary: string
  keyPoints: string[]
  relevanceScore: number
  notes: string | null
  status: ReaderReportStatus
}

export type FinalAnswer = {
  answer: string
  keyPoints: string[]
  /** Ledger entry ids the synthesizer reported using */
  usedResults: string[]
  notes: string | null
}

export type TokenUsage = {
  inputTokens: number
  outputTokens: number
}

export type RunUsageSummary = TokenUsage & {
  totalTokens: number
  agentCalls: number
}

export const ResearchResultKindEnum = z.enum([
  'direct_answer',
  'synthesized',
  'fallback_synthesized',
  'synthesis_failed'
])
export type ResearchResultKind = z.infer<typeof ResearchResultKindEnum>

export const TerminationReasonEnum = z.enum([
  'direct_answer',
  'planner_concluded',
  'round_cap',
  'deadline',
  'token_budget',
  'cancelled',
  'planner_failure'
])
export type TerminationReason = z.infer<typeof TerminationReasonEnum>

export type SynthesisFailure = {
  rawText: string
  reason: string
  detail: string
}
