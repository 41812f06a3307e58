import {
  PlanMessageSchema,
  ReflectionMessageSchema,
  SelectionMessageSchema,
  SynthesisMessageSchema,
  type CandidateDocument,
  type FinalAnswer,
  type ReaderReport,
  type Recency,
  type ReflectionMessage,
  type SearchQuery,
  type SearchRequest
} from '@deepseeker/shared'
import {
  invokeAndDecode,
  type AgentInvoker,
  type AgentMessage,
  type AgentStageFailure,
  type InvokeAndDecodeResult
} from './agent-invoker'
import type { ResearchRunContext } from './research-run-context'

export type StageOutcome<T> = { ok: true; value: T; rawText: string } | { ok: false; failure: AgentStageFailure }

export type PlannerDecision =
  | { action: 'direct_answer'; directAnswer: string | null; notes: string | null }
  | { action: 'search_then_answer'; search: SearchQuery; notes: string | null }

export type SelectionOutcome = {
  selectedIds: string[]
  /** Ids the planner returned that are not among the candidates */
  rejectedIds: string[]
  /** Valid ids dropped by the selection cap */
  truncated: number
  notes: string | null
  /** True when no agent call was made (no candidates) */
  skipped: boolean
}

export type SynthesisOutcome = {
  answer: FinalAnswer
  /** used_results entries that do not name a ledger entry */
  unknownUsedResults: string[]
}

const PLANNER_ROLE = [
  'You are the research planner. You answer a user question, researching the web only when it helps.',
  'Keep notes terse; never include chain-of-thought.',
  'Respond with exactly one ```json fenced block and nothing else.'
].join('\n')

const SEARCH_SHAPE = [
  '"search": {',
  '  "query": string,                         // keyword query for a web search engine',
  '  "when": "day" | "week" | "month" | "any", // optional recency filter',
  '  "include": string[],                     // optional, words every result must contain',
  '  "exclude": string[],                     // optional, words that drop a result',
  '  "allow_domains": string[],               // optional, only these domains',
  '  "deny_domains": string[],                // optional, never these domains',
  '  "max_results": number                    // optional',
  '}'
].join('\n')

function todayLine(now: Date) {
  return `Today is ${now.toISOString().slice(0, 10)}.`
}

export function buildPlanMessages(question: string, now: Date): AgentMessage[] {
  const system = [
    PLANNER_ROLE,
    todayLine(now),
    '',
    'Decide whether the question can be answered reliably without searching.',
    'Simple, stable or well-known facts: answer directly.',
    'Recent events, niche facts or anything needing sources: search first.',
    '',
    'Direct answer shape: { "action": "direct_answer", "direct_answer": string, "notes": string | null }',
    'Search shape: { "action": "search_then_answer", ' + SEARCH_SHAPE + ', "notes": string | null }'
  ].join('\n')
  return [
    { role: 'system', content: system },
    { role: 'user', content: `QUESTION: ${question}` }
  ]
}

function formatCandidate(candidate: CandidateDocument) {
  const meta = [candidate.source.domain, candidate.source.publishedHint ? `published ~${candidate.source.publishedHint}` : null]
    .filter(Boolean)
    .join(', ')
  return `[${candidate.id}] ${candidate.title}${meta ? ` (${meta})` : ''}\n    ${candidate.snippet || '(no snippet)'}`
}

export function buildSelectMessages(question: string, candidates: CandidateDocument[], cap: number): AgentMessage[] {
  const system = [
    PLANNER_ROLE,
    '',
    `Pick at most ${cap} search results worth reading in full to answer the question.`,
    'Prefer primary, authoritative and recent sources; avoid near-duplicates.',
    'Use only ids from the list.',
    '',
    'Shape: { "selected_ids": string[], "notes": string | null }'
  ].join('\n')
  return [
    { role: 'system', content: system },
    { role: 'user', content: `QUESTION: ${question}\n\nSEARCH RESULTS:\n${candidates.map(formatCandidate).join('\n')}` }
  ]
}

function formatEvidence(entry: ReaderReport) {
  if (entry.status !== 'ok') {
    return `[${entry.entryId}] ${entry.url} -- not readable (${entry.status}${entry.notes ? `: ${entry.notes}` : ''})`
  }
  const points = entry.keyPoints.map((point) => `    - ${point}`).join('\n')
  return [
    `[${entry.entryId}] ${entry.title} <${entry.url}> relevance=${entry.relevanceScore.toFixed(2)}`,
    `    ${entry.summary}`,
    points
  ]
    .filter(Boolean)
    .join('\n')
}

export function buildReflectMessages(
  question: string,
  ledger: ReaderReport[],
  round: number,
  maxRounds: number,
  searchHistory: string[],
  now: Date
): AgentMessage[] {
  const system = [
    PLANNER_ROLE,
    todayLine(now),
    '',
    `Research round ${round} of at most ${maxRounds} is complete. Review the evidence gathered so far.`,
    'If it is enough to answer well, conclude: { "action": "direct_answer", "notes": string | null }',
    'Otherwise request one more search with a query different from the earlier ones:',
    '{ "action": "search_then_answer", ' + SEARCH_SHAPE + ', "notes": string | null }'
  ].join('\n')
  const history = searchHistory.length ? searchHistory.map((query) => `- ${query}`).join('\n') : '- (none)'
  const evidence = ledger.length ? ledger.map(formatEvidence).join('\n') : '(no evidence yet)'
  return [
    { role: 'system', content: system },
    { role: 'user', content: `QUESTION: ${question}\n\nEARLIER QUERIES:\n${history}\n\nEVIDENCE:\n${evidence}` }
  ]
}

export function buildSynthesisMessages(question: string, ledger: ReaderReport[], minRelevance: number): AgentMessage[] {
  const usable = ledger.filter((entry) => entry.status === 'ok' && entry.relevanceScore >= minRelevance)
  const lowRelevance = ledger.filter((entry) => entry.status === 'ok' && entry.relevanceScore < minRelevance).length
  const unreadable = ledger.length - usable.length - lowRelevance
  const system = [
    PLANNER_ROLE,
    '',
    'Write the final answer to the question from the evidence below.',
    'Use markdown. Cite evidence inline by its id in square brackets, e.g. [1:r2].',
    'If the evidence is thin or conflicting, say so instead of guessing.',
    '',
    'Shape: { "answer": string, "key_points": string[], "used_results": string[], "notes": string | null }',
    'used_results lists the evidence ids you relied on.'
  ].join('\n')
  const evidence = usable.length ? usable.map(formatEvidence).join('\n') : '(no usable evidence; answer from general knowledge and say so)'
  const discarded: string[] = []
  if (lowRelevance) discarded.push(`${lowRelevance} low-relevance report(s) omitted`)
  if (unreadable) discarded.push(`${unreadable} document(s) could not be read`)
  return [
    { role: 'system', content: system },
    {
      role: 'user',
      content: `QUESTION: ${question}\n\nEVIDENCE:\n${evidence}${discarded.length ? `\n\n(${discarded.join('; ')})` : ''}`
    }
  ]
}

export function toSearchQuery(
  request: SearchRequest,
  defaults: { recency: Recency; resultCap: number }
): SearchQuery {
  const requested = request.max_results ?? defaults.resultCap
  return {
    query: request.query.trim(),
    when: request.when ?? defaults.recency,
    include: request.include ?? [],
    exclude: request.exclude ?? [],
    allowDomains: request.allow_domains ?? [],
    denyDomains: request.deny_domains ?? [],
    maxResults: Math.max(1, Math.min(requested, defaults.resultCap))
  }
}

function toOutcome<T, V>(result: InvokeAndDecodeResult<T>, map: (message: T) => V): StageOutcome<V> {
  if (!result.ok) return result
  return { ok: true, value: map(result.message), rawText: result.rawText }
}

type PlannerStageOptions = {
  now?: () => Date
}

/** Prompts and decoding for the planner's plan, select, reflect and synthesize calls. */
export class PlannerStage {
  private readonly now: () => Date

  constructor(
    private readonly invoker: AgentInvoker,
    options?: PlannerStageOptions
  ) {
    this.now = options?.now ?? (() => new Date())
  }

  async plan(ctx: ResearchRunContext): Promise<StageOutcome<PlannerDecision>> {
    const result = await invokeAndDecode(
      this.invoker,
      { role: 'planner', stage: 'plan', messages: buildPlanMessages(ctx.question, this.now()), signal: ctx.signal },
      PlanMessageSchema,
      ctx
    )
    return toOutcome(result, (message) => this.toDecision(ctx, message))
  }

  async select(ctx: ResearchRunContext, candidates: CandidateDocument[], cap: number): Promise<StageOutcome<SelectionOutcome>> {
    if (candidates.length === 0) {
      return {
        ok: true,
        value: { selectedIds: [], rejectedIds: [], truncated: 0, notes: null, skipped: true },
        rawText: ''
      }
    }

    const result = await invokeAndDecode(
      this.invoker,
      {
        role: 'planner',
        stage: 'select',
        messages: buildSelectMessages(ctx.question, candidates, cap),
        signal: ctx.signal
      },
      SelectionMessageSchema,
      ctx
    )
    return toOutcome(result, (message) => {
      const known = new Set(candidates.map((candidate) => candidate.id))
      const valid: string[] = []
      const rejectedIds: string[] = []
      for (const raw of message.selected_ids) {
        const id = raw.trim()
        if (!known.has(id)) {
          rejectedIds.push(raw)
        } else if (!valid.includes(id)) {
          valid.push(id)
        }
      }
      return {
        selectedIds: valid.slice(0, cap),
        rejectedIds,
        truncated: Math.max(0, valid.length - cap),
        notes: message.notes ?? null,
        skipped: false
      }
    })
  }

  async reflect(ctx: ResearchRunContext): Promise<StageOutcome<PlannerDecision>> {
    const messages = buildReflectMessages(
      ctx.question,
      ctx.ledger.list(),
      ctx.currentRound,
      ctx.config.maxRounds,
      ctx.searchHistory,
      this.now()
    )
    const result = await invokeAndDecode(
      this.invoker,
      { role: 'planner', stage: 'reflect', messages, signal: ctx.signal },
      ReflectionMessageSchema,
      ctx
    )
    return toOutcome(result, (message) => this.toDecision(ctx, message))
  }

  /** Runs under `signal` rather than the run signal so a passed deadline still gets an answer. */
  async synthesize(ctx: ResearchRunContext, signal?: AbortSignal): Promise<StageOutcome<SynthesisOutcome>> {
    const ledger = ctx.ledger.list()
    const result = await invokeAndDecode(
      this.invoker,
      {
        role: 'planner',
        stage: 'synthesize',
        messages: buildSynthesisMessages(ctx.question, ledger, ctx.config.minRelevanceForSynthesis),
        signal
      },
      SynthesisMessageSchema,
      ctx
    )
    return toOutcome(result, (message) => {
      const usedResults: string[] = []
      const unknownUsedResults: string[] = []
      for (const id of message.used_results) {
        if (ctx.ledger.has(id)) {
          if (!usedResults.includes(id)) usedResults.push(id)
        } else {
          unknownUsedResults.push(id)
        }
      }
      return {
        answer: {
          answer: message.answer.trim(),
          keyPoints: message.key_points,
          usedResults,
          notes: message.notes ?? null
        },
        unknownUsedResults
      }
    })
  }

  private toDecision(ctx: ResearchRunContext, message: ReflectionMessage): PlannerDecision {
    if (message.action === 'direct_answer') {
      return {
        action: 'direct_answer',
        directAnswer: message.direct_answer?.trim() || null,
        notes: message.notes ?? null
      }
    }
    return {
      action: 'search_then_answer',
      search: toSearchQuery(message.search, {
        recency: ctx.config.defaultRecency,
        resultCap: ctx.config.perRoundResultCap
      }),
      notes: message.notes ?? null
    }
  }
}
